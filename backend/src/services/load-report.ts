import { promises as fsp } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import type { EntityType } from '../types/loader.js';
import { LOAD_ORDER } from './entity-catalog.js';
import type { EntityTally, LoadReport } from './load-orchestrator.js';

function entries(report: LoadReport): Array<[EntityType, EntityTally]> {
  const rows: Array<[EntityType, EntityTally]> = [];
  for (const type of LOAD_ORDER) {
    const tally = report.entities[type];
    if (tally) rows.push([type, tally]);
  }
  return rows;
}

function csvQuote(value: string): string {
  return `"${value.replace(/"/g, '""')}"`;
}

export function formatLoadReport(report: LoadReport): string {
  const rows = entries(report);
  const width = Math.max('entity'.length, ...rows.map(([type]) => type.length));
  const lines: string[] = [];
  lines.push(`Load ${report.status}${report.error ? `: ${report.error}` : ''}`);
  lines.push(`${'entity'.padEnd(width)}  inserted  updated  unchanged  failed`);
  for (const [type, tally] of rows) {
    lines.push(
      [
        type.padEnd(width),
        String(tally.inserted).padStart(8),
        String(tally.updated).padStart(7),
        String(tally.unchanged).padStart(9),
        String(tally.failed.length).padStart(6),
      ].join('  ')
    );
  }
  const failures = rows.flatMap(([, tally]) => tally.failed);
  if (failures.length) {
    lines.push('');
    lines.push('Failed rows:');
    for (const failure of failures) {
      lines.push(`  ${failure.sheet} row ${failure.rowIndex} [${failure.kind}] ${failure.reason}`);
    }
  }
  return lines.join(os.EOL);
}

export function buildReportCsv(report: LoadReport): string {
  const rows = entries(report);
  const lines: string[] = ['entity,sheet,inserted,updated,unchanged,failed'];
  for (const [type, tally] of rows) {
    lines.push(`${type},${tally.sheet},${tally.inserted},${tally.updated},${tally.unchanged},${tally.failed.length}`);
  }
  for (const [, tally] of rows) {
    for (const failure of tally.failed) {
      lines.push(`failure,${failure.sheet},${failure.rowIndex},${csvQuote(`${failure.kind}: ${failure.reason}`)}`);
    }
  }
  return lines.join(os.EOL);
}

export async function writeReportCsv(report: LoadReport, reportPath: string): Promise<string> {
  const resolved = path.resolve(reportPath);
  await fsp.mkdir(path.dirname(resolved), { recursive: true });
  await fsp.writeFile(resolved, buildReportCsv(report), 'utf8');
  return resolved;
}
