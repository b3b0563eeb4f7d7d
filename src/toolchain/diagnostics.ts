export type CompilerDiagnostic = {
  file?: string;
  line?: number;
  col?: number;
  severity: 'error' | 'warning' | 'note';
  message: string;
  raw: string;
};

const ccRe = /^(.*?):(\d+):(?:(\d+):)?\s*(warning|error|note|fatal error):\s*(.*)$/;

export function parseDiagnostics(text: string): CompilerDiagnostic[] {
  // clang/gcc: path:line:col: error: message
  const out: CompilerDiagnostic[] = [];

  for (const l of text.split(/\r?\n/)) {
    const m = l.match(ccRe);
    if (!m) continue;
    const sev = m[4];
    out.push({
      file: m[1],
      line: Number(m[2]),
      col: m[3] === undefined ? undefined : Number(m[3]),
      severity: sev === 'fatal error' ? 'error' : sev === 'warning' || sev === 'note' ? sev : 'error',
      message: m[5],
      raw: l,
    });
  }

  return out;
}

export function formatDiagnostics(diags: CompilerDiagnostic[]): string {
  if (!diags.length) return '';
  const lines: string[] = [];
  for (const d of diags) {
    const loc = d.file && d.line != null ? `${d.file}:${d.line}:${d.col ?? 0}` : d.file ?? '';
    const head = loc ? `${loc} - ${d.severity}` : d.severity;
    const msg = d.message ? `: ${d.message}` : '';
    lines.push(`${head}${msg}`);
  }
  return lines.join('\n');
}

/** Counts shown in progress lines, e.g. "2 errors, 1 warning". */
export function summarizeDiagnostics(diags: CompilerDiagnostic[]): string {
  const errors = diags.filter((d) => d.severity === 'error').length;
  const warnings = diags.filter((d) => d.severity === 'warning').length;
  const parts: string[] = [];
  if (errors) parts.push(`${errors} error${errors === 1 ? '' : 's'}`);
  if (warnings) parts.push(`${warnings} warning${warnings === 1 ? '' : 's'}`);
  return parts.join(', ');
}
