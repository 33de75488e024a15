import { parseArgs } from 'node:util';
import { z } from 'zod';

type DbConfig = {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
};

export function getDatabaseConfig(env: NodeJS.ProcessEnv = process.env): DbConfig {
  return {
    host: env.POSTGRES_HOST || 'localhost',
    port: parseInt(env.POSTGRES_PORT || '5432', 10),
    user: env.POSTGRES_USER || 'school',
    password: env.POSTGRES_PASSWORD || 'schoolpass',
    database: env.POSTGRES_DB || 'schooldb',
  };
}

export function buildConnectionString(db: DbConfig): string {
  const credentials = `${encodeURIComponent(db.user)}:${encodeURIComponent(db.password)}`;
  return `postgres://${credentials}@${db.host}:${db.port}/${encodeURIComponent(db.database)}`;
}

const configSchema = z.object({
  databaseUrl: z
    .string()
    .trim()
    .regex(/^postgres(ql)?:\/\//, 'database must be a postgres:// connection string'),
  workbookPath: z
    .string()
    .trim()
    .min(1, 'a workbook path is required (--workbook or LOADER_WORKBOOK)'),
  reportPath: z
    .string()
    .trim()
    .min(1)
    .optional(),
});

export type LoaderConfig = z.infer<typeof configSchema>;

/** Command-line options win over environment variables. */
export function loadConfig(argv: string[], env: NodeJS.ProcessEnv = process.env): LoaderConfig {
  const { values } = parseArgs({
    args: argv,
    options: {
      database: { type: 'string' },
      workbook: { type: 'string' },
      report: { type: 'string' },
    },
    strict: true,
    allowPositionals: false,
  });

  return configSchema.parse({
    databaseUrl: values.database ?? env.DATABASE_URL ?? buildConnectionString(getDatabaseConfig(env)),
    workbookPath: values.workbook ?? env.LOADER_WORKBOOK ?? '',
    reportPath: values.report ?? env.LOADER_REPORT_PATH,
  });
}
