import type { CliError } from './errors.js';

export interface ValidationIssue {
  file: string;
  field: string;
  message: string;
}

export interface ValidationReport {
  valid: boolean;
  catalogRoot: string;
  documents: number;
  issues: ValidationIssue[];
}

export interface SearchResultRow {
  id: string;
  version: string;
  displayName: string;
  downloads: number;
  score: number;
}

export interface SearchReport {
  totalHits: number;
  results: SearchResultRow[];
}

export function formatCliError(error: CliError, json: boolean): string {
  if (json) {
    return JSON.stringify({
      code: error.code,
      message: error.message,
      suggestion: error.suggestion,
      exitCode: error.exitCode,
    });
  }

  const lines = [`[${error.code}] ${error.message}`];
  if (error.suggestion) {
    lines.push(`suggestion: ${error.suggestion}`);
  }
  return lines.join('\n');
}

export function formatValidationIssue(issue: ValidationIssue): string {
  return `${issue.file}: ${issue.field} ${issue.message}`;
}

export function formatSearchReport(report: SearchReport): string[] {
  if (report.results.length === 0) {
    return ['No extensions found.'];
  }

  const idWidth = Math.max(...report.results.map((row) => row.id.length));
  const versionWidth = Math.max(...report.results.map((row) => row.version.length));

  const lines = report.results.map(
    (row) => `${pad(row.id, idWidth)}  ${pad(row.version, versionWidth)}  ${row.displayName}`,
  );
  lines.push(`${report.results.length} of ${report.totalHits} extensions`);
  return lines;
}

function pad(value: string, width: number): string {
  return value.padEnd(width, ' ');
}
