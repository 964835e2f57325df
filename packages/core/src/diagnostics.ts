/**
 * uiscript diagnostic types for lex/parse/compile errors.
 */
import type { Span } from "./ast.js";

export interface DiagnosticSpan extends Span {
  file?: string;
}

export interface Diagnostic {
  code: string;
  message: string;
  span?: DiagnosticSpan;
  hint?: string;
}

export function makeDiag(
  code: string,
  message: string,
  span?: DiagnosticSpan,
  hint?: string
): Diagnostic {
  return { code, message, span, hint };
}

/** Attaches a file name to every diagnostic that has a span. */
export function withFile(diags: Diagnostic[], file: string): Diagnostic[] {
  return diags.map((d) => (d.span ? { ...d, span: { ...d.span, file } } : d));
}

export function formatDiagnostic(d: Diagnostic, pretty: boolean): string {
  if (!pretty) {
    return JSON.stringify(d);
  }
  const loc = d.span
    ? `${d.span.file ?? "<block>"}:${d.span.line}:${d.span.column}`
    : "<unknown>";
  let out = `error[${d.code}]: ${d.message}\n  --> ${loc}`;
  if (d.hint) {
    out += `\n  hint: ${d.hint}`;
  }
  return out;
}

export function formatDiagnostics(diags: Diagnostic[], pretty: boolean): string {
  if (!pretty) {
    return JSON.stringify(diags);
  }
  return diags.map((d) => formatDiagnostic(d, true)).join("\n\n");
}
