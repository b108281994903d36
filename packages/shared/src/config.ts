/**
 * Agent configuration loader.
 *
 * Builds an AgentConfig from:
 *   1. A JSON file at TOOLLOOP_CONFIG_PATH (optional)
 *   2. Environment variable overrides for limits, model and credentials
 *   3. Defaults
 *
 * The result is validated with zod and deep-frozen: agents read it, never write it.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { logger } from './logger.js';

const log = logger.child({ module: 'config' });

const RemoteServerSchema = z
  .object({
    id: z.string().min(1),
    transport: z.enum(['stream', 'process']),
    endpointOrCommand: z.string().min(1),
    args: z.array(z.string()).default([]),
    protocol: z.enum(['sse', 'streamable-http']).optional(),
    env: z.record(z.string()).optional(),
    headers: z.record(z.string()).optional(),
  })
  .refine((server) => server.transport === 'process' || URL.canParse(server.endpointOrCommand), {
    message: 'stream servers need an absolute URL',
    path: ['endpointOrCommand'],
  });

const ModelSchema = z.object({
  provider: z.literal('anthropic').default('anthropic'),
  modelName: z.string().min(1).default('claude-sonnet-4-20250514'),
  maxTokens: z.number().int().positive().default(4096),
  apiKey: z.string().min(1).optional(),
  baseURL: z.string().url().optional(),
});

export const AgentConfigSchema = z.object({
  maxSteps: z.number().int().positive().default(10),
  maxStuckCount: z.number().int().min(2).default(3),
  /** Ceiling on each tool result's length before it enters memory */
  maxObserve: z.number().int().positive().default(10_000),
  /** Estimated-token ceiling on the conversation; unset means no local check */
  maxContextTokens: z.number().int().positive().optional(),
  /** Name of the tool whose live context is folded into the next-step prompt */
  statefulTool: z.string().min(1).optional(),
  servers: z
    .array(RemoteServerSchema)
    .superRefine((servers, ctx) => {
      const seen = new Set<string>();
      servers.forEach((server, index) => {
        if (seen.has(server.id)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `duplicate server id '${server.id}'`,
            path: [index, 'id'],
          });
        }
        seen.add(server.id);
      });
    })
    .default([]),
  model: ModelSchema.default({}),
});

export type AgentConfig = z.infer<typeof AgentConfigSchema>;
export type AgentLimits = Pick<AgentConfig, 'maxSteps' | 'maxStuckCount' | 'maxObserve' | 'maxContextTokens' | 'statefulTool'>;

export type DeepReadonly<T> = T extends (infer U)[]
  ? ReadonlyArray<DeepReadonly<U>>
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

function deepFreeze(value: unknown): void {
  if (value && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
}

function readIntEnv(name: string): number | undefined {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return undefined;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw new Error(`config: ${name} must be an integer, got '${raw}'`);
  }
  return parsed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function loadConfigFile(path: string): Promise<Record<string, unknown>> {
  const raw = await readFile(path, 'utf-8');
  const parsed: unknown = JSON.parse(raw);
  if (!isRecord(parsed)) {
    throw new Error(`config: expected a JSON object in '${path}'`);
  }
  return parsed;
}

function applyEnvOverrides(input: Record<string, unknown>): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...input };

  const limits: Array<[keyof AgentConfig, string]> = [
    ['maxSteps', 'MAX_STEPS'],
    ['maxStuckCount', 'MAX_STUCK_COUNT'],
    ['maxObserve', 'MAX_OBSERVE'],
    ['maxContextTokens', 'MAX_CONTEXT_TOKENS'],
  ];
  for (const [key, envName] of limits) {
    const value = readIntEnv(envName);
    if (value !== undefined) {
      merged[key] = value;
      log.info({ [key]: value }, `${envName} override applied`);
    }
  }

  if (process.env.STATEFUL_TOOL) {
    merged.statefulTool = process.env.STATEFUL_TOOL;
  }

  const model: Record<string, unknown> = isRecord(input.model) ? { ...input.model } : {};
  if (process.env.DEFAULT_MODEL) {
    model.modelName = process.env.DEFAULT_MODEL;
    log.info({ model: model.modelName }, 'DEFAULT_MODEL override applied');
  }
  if (process.env.ANTHROPIC_API_KEY && model.apiKey === undefined) {
    model.apiKey = process.env.ANTHROPIC_API_KEY;
  }
  if (process.env.ANTHROPIC_BASE_URL) {
    model.baseURL = process.env.ANTHROPIC_BASE_URL;
  }
  merged.model = model;

  return merged;
}

/** Validate a raw config object; throws with every zod issue on failure */
export function parseAgentConfig(input: unknown): DeepReadonly<AgentConfig> {
  const result = AgentConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`config: invalid agent config: ${issues}`);
  }
  deepFreeze(result.data);
  return result.data;
}

/**
 * Load the agent configuration.
 * Never mutated after this returns.
 */
export async function loadAgentConfig(): Promise<DeepReadonly<AgentConfig>> {
  const configPath = process.env.TOOLLOOP_CONFIG_PATH;
  let fileConfig: Record<string, unknown> = {};

  if (configPath) {
    fileConfig = await loadConfigFile(configPath);
    log.info({ configPath }, 'loaded agent config from file');
  } else {
    log.info('TOOLLOOP_CONFIG_PATH not set, using defaults and environment');
  }

  const config = parseAgentConfig(applyEnvOverrides(fileConfig));
  log.info(
    {
      maxSteps: config.maxSteps,
      maxStuckCount: config.maxStuckCount,
      servers: config.servers.map((s) => s.id),
      model: config.model.modelName,
    },
    'agent config loaded',
  );
  return config;
}
