import path from 'node:path';
import { z } from 'zod';
import {
  DEFAULT_CHARACTERIZATION_BATCH_SIZE,
  MAX_CHARACTERIZATION_BATCH_SIZE
} from '../services/characterization.service';
import { deriveModelVersion } from '../loader/modelInfo';

export type LoaderConfig = {
  databaseUrl: string;
  exportDir: string;
  modelVersion: string;
  /** True when modelVersion came from the export directory name. */
  modelVersionDerived: boolean;
  batchSize: number;
};

const emptyToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const loaderEnvSchema = z.object({
  DATABASE_URL: z.preprocess(emptyToUndefined, z.string({ required_error: 'DATABASE_URL must be set' })),
  USEEIO_EXPORT_DIR: z.preprocess(emptyToUndefined, z.string().optional()),
  USEEIO_MODEL_VERSION: z.preprocess(emptyToUndefined, z.string().trim().optional()),
  USEEIO_BATCH_SIZE: z.preprocess(
    emptyToUndefined,
    z.coerce
      .number()
      .int()
      .positive()
      .max(MAX_CHARACTERIZATION_BATCH_SIZE)
      .default(DEFAULT_CHARACTERIZATION_BATCH_SIZE)
  )
});

/**
 * Loader settings from the environment, with the export directory also
 * accepted as the first CLI argument. Relative paths resolve against cwd.
 */
export function getLoaderConfig(
  env: NodeJS.ProcessEnv = process.env,
  argv: string[] = process.argv.slice(2),
  cwd: string = process.cwd()
): LoaderConfig {
  const parsed = loaderEnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`LOADER_CONFIG_INVALID ${issues}`);
  }

  const exportDirRaw = parsed.data.USEEIO_EXPORT_DIR ?? argv.find((arg) => !arg.startsWith('--'));
  if (!exportDirRaw) {
    throw new Error('LOADER_CONFIG_INVALID USEEIO_EXPORT_DIR must be set or the export directory passed as the first argument');
  }
  const exportDir = path.resolve(cwd, exportDirRaw);
  const explicitVersion = parsed.data.USEEIO_MODEL_VERSION;

  return {
    databaseUrl: parsed.data.DATABASE_URL,
    exportDir,
    modelVersion: explicitVersion ?? deriveModelVersion(exportDir),
    modelVersionDerived: explicitVersion === undefined,
    batchSize: parsed.data.USEEIO_BATCH_SIZE
  };
}
