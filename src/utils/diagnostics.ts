/**
 * Diagnostics
 * Converts compiler errors to LSP diagnostics and to human readable text
 */

import { Diagnostic, DiagnosticSeverity, Range } from 'vscode-languageserver/node';
import { TextDocument } from 'vscode-languageserver-textdocument';
import { URI } from 'vscode-uri';
import { Location } from '../core/ast';
import { NodeSchemaSource, SchemaSource } from '../core/schemaSource';
import { DIAGNOSTIC_SOURCE } from './constants';
import { CompilerError, isCompilerError } from './errors';

const EMPTY_RANGE: Range = { start: { line: 0, character: 0 }, end: { line: 0, character: 0 } };

/**
 * A diagnostic together with the document it belongs to
 */
export interface FileDiagnostic {
  uri?: string;
  diagnostic: Diagnostic;
}

export function toDiagnostic(error: CompilerError): Diagnostic {
  const diagnostic: Diagnostic = {
    severity: DiagnosticSeverity.Error,
    range: error.location?.range ?? EMPTY_RANGE,
    message: error.message,
    code: error.code,
    source: DIAGNOSTIC_SOURCE
  };
  const related = error.relatedLocations;
  if (related.length > 0) {
    diagnostic.relatedInformation = related.map(({ location, message }) => ({
      location: { uri: location.uri, range: location.range },
      message
    }));
  }
  return diagnostic;
}

/**
 * Diagnostic for any thrown value; errors outside the compiler taxonomy
 * carry no location
 */
export function toFileDiagnostic(error: unknown): FileDiagnostic {
  if (isCompilerError(error)) {
    return { uri: error.location?.uri, diagnostic: toDiagnostic(error) };
  }
  return {
    diagnostic: {
      severity: DiagnosticSeverity.Error,
      range: EMPTY_RANGE,
      message: error instanceof Error ? error.message : String(error),
      source: DIAGNOSTIC_SOURCE
    }
  };
}

function displayPath(uri: string): string {
  return uri.startsWith('file:') ? URI.parse(uri).fsPath : uri;
}

function describeLocation(location: Location): string {
  const { start } = location.range;
  return `${displayPath(location.uri)}:${start.line + 1}:${start.character + 1}`;
}

/**
 * The offending source line with a marker under the range, or nothing when
 * the file cannot be read
 */
function excerpt(location: Location, source: SchemaSource): string[] {
  let text: string;
  try {
    text = source.readFile(displayPath(location.uri));
  } catch {
    return [];
  }
  const document = TextDocument.create(location.uri, 'proto', 1, text);
  const { start, end } = location.range;
  if (start.line >= document.lineCount) {
    return [];
  }
  const line = document
    .getText({ start: { line: start.line, character: 0 }, end: { line: start.line + 1, character: 0 } })
    .replace(/\r?\n$/, '');
  const width = end.line === start.line ? Math.max(1, end.character - start.character) : 1;
  return [`  ${line}`, `  ${' '.repeat(start.character)}^${'~'.repeat(width - 1)}`];
}

/**
 * Render an error as `path:line:col: error[code]: message`, followed by a
 * source excerpt and notes for related locations
 */
export function formatCompilerError(error: unknown, source: SchemaSource = new NodeSchemaSource()): string {
  if (!isCompilerError(error)) {
    return `error: ${error instanceof Error ? error.message : String(error)}`;
  }
  if (!error.location) {
    return `error[${error.code}]: ${error.message}`;
  }

  const lines = [`${describeLocation(error.location)}: error[${error.code}]: ${error.message}`];
  lines.push(...excerpt(error.location, source));
  for (const related of error.relatedLocations) {
    lines.push(`${describeLocation(related.location)}: note: ${related.message}`);
  }
  return lines.join('\n');
}
