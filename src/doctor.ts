import { existsSync, statSync } from 'node:fs';

import type { BuildContext } from './config/context.js';
import type { ToolchainOverrides, ToolchainInfo } from './toolchain/toolchainTypes.js';
import { detectToolchain } from './toolchain/detectToolchain.js';
import { errorMessage } from './errors.js';

export function fmtOk(msg: string) {
	return `✓ ${msg}`;
}

export function fmtFail(msg: string) {
	return `✗ ${msg}`;
}

function dirLine(label: string, dir: string, required: boolean): string {
	if (!existsSync(dir)) {
		return required ? fmtFail(`${label} missing: ${dir}`) : fmtOk(`${label} will be created at ${dir}`);
	}
	if (!statSync(dir).isDirectory()) return fmtFail(`${label} is not a directory: ${dir}`);
	return fmtOk(`${label} OK (${dir})`);
}

/** Environment report for `forgekit doctor`. Failing lines start with ✗. */
export function doctorReport(
	ctx: BuildContext,
	overrides: ToolchainOverrides = {},
	detect: (o: ToolchainOverrides) => ToolchainInfo = detectToolchain,
): string[] {
	const lines: string[] = [];
	try {
		const { compiler, archiver, platform } = detect(overrides);
		lines.push(fmtOk(`Compiler detected (${compiler.vendor} ${compiler.version}) at ${compiler.path}`));
		lines.push(fmtOk(`Archiver detected at ${archiver.path}`));
		lines.push(fmtOk(`Platform ${platform.platform}-${platform.arch}`));
	} catch (e) {
		lines.push(fmtFail(`Toolchain detection failed: ${errorMessage(e)}`));
	}

	lines.push(dirLine('Source root', ctx.sourceRoot, true));
	lines.push(dirLine('Test root', ctx.testRoot, false));
	lines.push(dirLine('Include root', ctx.includeRoot, false));
	for (const dir of [ctx.buildDir, ctx.binDir, ctx.libDir]) {
		lines.push(dirLine('Output directory', dir, false));
	}
	return lines;
}

export function isHealthy(lines: readonly string[]): boolean {
	return !lines.some((l) => l.startsWith('✗'));
}
