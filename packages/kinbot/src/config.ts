import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { cosmiconfigSync } from 'cosmiconfig';
import { z } from 'zod';

const packageRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..');

const PathSchema = (name: string) =>
  z
    .string()
    .min(1)
    .refine((value) => value.startsWith('/'), `${name} must start with "/"`);

const ModelConfigSchema = z.object({
  backend: z.enum(['pi-ai', 'gemini']).default('gemini'),
  provider: z.string().trim().min(1).default('google'),
  id: z.string().trim().min(1).default('gemini-2.0-flash'),
  temperature: z.number().min(0).max(2).default(0.7),
  maxOutputTokens: z.number().int().positive().default(1024),
});

const HistoryConfigSchema = z
  .object({
    compactionThreshold: z.number().int().min(2).default(20),
    keepRecent: z.number().int().min(0).default(5),
  })
  .refine((value) => value.keepRecent < value.compactionThreshold, {
    message: 'history.keepRecent must be lower than history.compactionThreshold',
    path: ['keepRecent'],
  });

const MemoryConfigSchema = z.object({
  contextMinImportance: z.number().int().min(1).max(10).default(5),
  contextLimit: z.number().int().positive().default(5),
});

const JobsConfigSchema = z.object({
  enabled: z.boolean().default(true),
  timezone: z.string().trim().min(1).default('UTC'),
  compactionSweep: z
    .object({
      enabled: z.boolean().default(true),
      cron: z.string().trim().min(1).default('*/15 * * * *'),
    })
    .default({ enabled: true, cron: '*/15 * * * *' }),
});

const KinbotConfigSchema = z.object({
  server: z.object({
    port: z.number().int().min(1).max(65_535),
    wsPath: PathSchema('server.wsPath').default('/ws/interact'),
    restorePath: PathSchema('server.restorePath').default('/api/restore'),
    maxPayloadBytes: z.number().int().positive().default(26_214_400),
  }),
  auth: z
    .object({
      handshakeTimeoutMs: z.number().int().positive('timeout must be a positive integer').default(10_000),
    })
    .default({ handshakeTimeoutMs: 10_000 }),
  model: ModelConfigSchema.default({
    backend: 'gemini',
    provider: 'google',
    id: 'gemini-2.0-flash',
    temperature: 0.7,
    maxOutputTokens: 1024,
  }),
  store: z.object({
    path: z.string().trim().min(1),
  }),
  history: HistoryConfigSchema.default({ compactionThreshold: 20, keepRecent: 5 }),
  memory: MemoryConfigSchema.default({ contextMinImportance: 5, contextLimit: 5 }),
  battery: z
    .object({
      lowThreshold: z.number().int().min(0).max(100).default(15),
    })
    .default({ lowThreshold: 15 }),
  jobs: JobsConfigSchema.default({
    enabled: true,
    timezone: 'UTC',
    compactionSweep: { enabled: true, cron: '*/15 * * * *' },
  }),
  secretsFile: z.string().trim().min(1),
});

const KinbotSecretsSchema = z.object({
  apiKey: z.string().trim().min(1),
  modelApiKey: z.string().trim().min(1),
});

type KinbotConfigData = z.infer<typeof KinbotConfigSchema>;

export type KinbotConfig = KinbotConfigData & {
  configFilePath: string;
  storePath: string;
  secretsFilePath: string;
};

export type KinbotSecrets = z.infer<typeof KinbotSecretsSchema>;
export type ModelConfig = z.infer<typeof ModelConfigSchema>;

function resolveRelativeToConfig(rawPath: string, configFilePath: string): string {
  if (rawPath === ':memory:') {
    return rawPath;
  }

  if (path.isAbsolute(rawPath)) {
    return path.normalize(rawPath);
  }

  return path.resolve(path.dirname(configFilePath), rawPath);
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

export function parseKinbotConfig(raw: unknown, configFilePath: string): KinbotConfig {
  const parsed = KinbotConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`[kinbot] invalid config in ${configFilePath}: ${formatIssues(parsed.error)}`);
  }

  return {
    ...parsed.data,
    configFilePath,
    storePath: resolveRelativeToConfig(parsed.data.store.path, configFilePath),
    secretsFilePath: resolveRelativeToConfig(parsed.data.secretsFile, configFilePath),
  };
}

export function loadKinbotConfig(searchFrom: string = packageRoot): KinbotConfig {
  const explorer = cosmiconfigSync('kinbot', {
    searchPlaces: ['kinbot.config.local.json', 'kinbot.config.json'],
    stopDir: searchFrom,
  });

  const result = explorer.search(searchFrom);

  if (!result || result.isEmpty) {
    throw new Error(
      '[kinbot] configuration file not found. Expected one of: kinbot.config.local.json or kinbot.config.json',
    );
  }

  return parseKinbotConfig(result.config, result.filepath);
}

export function loadKinbotSecrets(secretsFilePath: string): KinbotSecrets {
  let raw: string;

  try {
    raw = readFileSync(secretsFilePath, 'utf8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`[kinbot] failed to read secrets file ${secretsFilePath}: ${message}`);
  }

  let json: unknown;

  try {
    json = JSON.parse(raw);
  } catch {
    throw new Error(`[kinbot] secrets file is not valid JSON: ${secretsFilePath}`);
  }

  const parsed = KinbotSecretsSchema.safeParse(json);
  if (!parsed.success) {
    throw new Error(`[kinbot] invalid secrets in ${secretsFilePath}: ${formatIssues(parsed.error)}`);
  }

  return parsed.data;
}
