import { z } from 'zod';
import { ExponentialRetryPolicy } from '@tablestore/resilient-http-core';
import { InvalidArgumentError } from './errors';
import { TableClient } from './TableClient';
import type { TableClientConfig } from './TableClient';

const DEFAULT_MAX_ATTEMPTS = 4;

const optionalUrl = z
  .string()
  .trim()
  .url()
  .optional()
  .or(z.literal('').transform(() => undefined));

const envSchema = z
  .object({
    TABLE_ACCOUNT_NAME: z.string({ required_error: 'is required' }).trim().min(1, 'is required'),
    TABLE_ACCOUNT_KEY: z.string().trim().min(1).optional(),
    TABLE_ENDPOINT: optionalUrl,
    TABLE_SECONDARY_ENDPOINT: optionalUrl,
    TABLE_PAYLOAD_FORMAT: z.enum(['json', 'jsonNoMetadata', 'jsonFullMetadata']).default('json'),
    TABLE_LOCATION_MODE: z
      .enum(['primaryOnly', 'primaryThenSecondary', 'secondaryOnly', 'secondaryThenPrimary'])
      .default('primaryOnly'),
    TABLE_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(20).default(DEFAULT_MAX_ATTEMPTS),
    TABLE_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  })
  .superRefine((env, ctx) => {
    // A custom primary has no derivable secondary.
    if (env.TABLE_LOCATION_MODE !== 'primaryOnly' && env.TABLE_ENDPOINT && !env.TABLE_SECONDARY_ENDPOINT) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['TABLE_SECONDARY_ENDPOINT'],
        message: `is required for location mode ${env.TABLE_LOCATION_MODE}`,
      });
    }
  });

export type TableClientEnv = z.infer<typeof envSchema>;

const defaultEndpoint = (accountName: string): string => `https://${accountName}.table.core.windows.net`;
const defaultSecondaryEndpoint = (accountName: string): string =>
  `https://${accountName}-secondary.table.core.windows.net`;

/**
 * Reads client settings from `TABLE_*` environment variables.
 *
 * Without a key the client is anonymous. Without explicit endpoints the
 * account's public table endpoints are used.
 */
export function loadTableClientConfigFromEnv(env: NodeJS.ProcessEnv = process.env): TableClientConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue?.path.join('.') || 'environment';
    throw new InvalidArgumentError(`${variable} ${issue?.message ?? 'is invalid'}`, variable);
  }

  const values = parsed.data;
  const accountName = values.TABLE_ACCOUNT_NAME;
  const secondary =
    values.TABLE_SECONDARY_ENDPOINT ?? (values.TABLE_ENDPOINT ? undefined : defaultSecondaryEndpoint(accountName));

  return {
    endpoints: {
      primary: values.TABLE_ENDPOINT ?? defaultEndpoint(accountName),
      secondary,
    },
    credentials: values.TABLE_ACCOUNT_KEY
      ? { kind: 'sharedKey', accountName, accountKey: values.TABLE_ACCOUNT_KEY }
      : { kind: 'anonymous' },
    defaultRequestOptions: {
      payloadFormat: values.TABLE_PAYLOAD_FORMAT,
      locationMode: values.TABLE_LOCATION_MODE,
      retryPolicy: new ExponentialRetryPolicy({ maxAttempts: values.TABLE_MAX_ATTEMPTS }),
      perAttemptTimeoutMs: values.TABLE_TIMEOUT_MS,
    },
  };
}

export function createTableClientFromEnv(
  overrides?: Partial<TableClientConfig>,
  env: NodeJS.ProcessEnv = process.env,
): TableClient {
  return new TableClient({ ...loadTableClientConfigFromEnv(env), ...overrides });
}
