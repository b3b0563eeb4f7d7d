import { setQuiet } from '../dx/logger.js';

setQuiet(true);
