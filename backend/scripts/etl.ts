#!/usr/bin/env node
// Loads a school onboarding workbook into the school schema.
// Usage: school-onboarding-load --database <postgres url> --workbook <file.xlsx> [--report <file.csv>]

import 'dotenv/config';
import { ZodError } from 'zod';
import { loadConfig, type LoaderConfig } from '../src/config.js';
import { connectDatabase, type Database } from '../src/db.js';
import { LoadOrchestrator } from '../src/services/load-orchestrator.js';
import { formatLoadReport, writeReportCsv } from '../src/services/load-report.js';
import { SheetReader } from '../src/services/sheet-reader.js';
import { PgStore } from '../src/store/pg-store.js';

function describe(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`).join('; ');
  }
  return error instanceof Error ? error.message : String(error);
}

async function main(): Promise<number> {
  let config: LoaderConfig;
  let reader: SheetReader;
  let db: Database;

  try {
    config = loadConfig(process.argv.slice(2));
  } catch (error) {
    console.error(`[loader] invalid options: ${describe(error)}`);
    return 1;
  }

  try {
    reader = await SheetReader.fromFile(config.workbookPath);
  } catch (error) {
    console.error(`[loader] cannot read workbook ${config.workbookPath}: ${describe(error)}`);
    return 1;
  }

  try {
    db = await connectDatabase(config.databaseUrl);
  } catch (error) {
    console.error(`[loader] cannot connect to database: ${describe(error)}`);
    return 1;
  }

  try {
    const report = await new LoadOrchestrator({ reader, store: new PgStore(db) }).run();
    console.log(formatLoadReport(report));
    if (config.reportPath) {
      const written = await writeReportCsv(report, config.reportPath);
      console.log(`[loader] report written to ${written}`);
    }
    return report.status === 'completed' ? 0 : 1;
  } finally {
    await db.close();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(`[loader] ${describe(error)}`);
    process.exitCode = 1;
  }
);
