import { z } from 'zod';
import { loadConfig } from 'zod-config';
import { dotEnvAdapter } from 'zod-config/dotenv-adapter';
import { envAdapter } from 'zod-config/env-adapter';
import { CIPHER_CONVENTIONS, DEFAULT_CONFIG } from '../constants/defaults.js';

/**
 * Centralised configuration schema.
 *
 * All hard-coded defaults belong here – this doubles as live documentation.
 */
export const configSchema = z.object({
  // Runtime environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Log verbosity
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),

  // Block tree size used by TreeSubCipher
  CIPHER_BLOCK_SIZE: z.coerce.number().int().min(1).default(DEFAULT_CONFIG.BLOCK_SIZE),

  // Write/read order convention used when none is passed explicitly
  CIPHER_CONVENTION: z.enum(CIPHER_CONVENTIONS).default(DEFAULT_CONFIG.CONVENTION),
});

export type AppConfig = z.infer<typeof configSchema>;

// The resolved configuration object, fully validated & typed.
// Top-level await makes sure that every importer sees a ready-to-use value.
export const cfg: AppConfig = await loadConfig({
  schema: configSchema,
  adapters: [
    // Order matters: later adapters win -> env overrides `.env` defaults.
    dotEnvAdapter({ path: '.env', silent: true }),
    envAdapter(),
  ],
});
