import { z } from 'zod';

const base64Key = (bytes?: number) =>
  z
    .string()
    .min(1)
    .refine((value) => {
      const decoded = Buffer.from(value, 'base64');
      return decoded.length > 0 && (bytes === undefined || decoded.length === bytes);
    }, bytes === undefined ? 'must be base64' : `must be ${bytes} base64-encoded bytes`);

export const envSchema = z.object({
  DATABASE_URL: z.string().url(),
  PORT: z.coerce.number().int().positive().default(4000),
  LEDGER_SYSTEM_ADDRESS: z.string().regex(/^0x[0-9a-fA-F]{40}$/, 'must be a 20-byte hex address'),
  /** Raw uncompressed P-256 point. */
  NETWORK_PUBLIC_KEY: base64Key(65),
  /** PKCS#8. */
  NETWORK_PRIVATE_KEY: base64Key(),
  NETWORK_STORAGE_KEY: base64Key(32),
  DECRYPTION_MAX_VALIDITY_DAYS: z.coerce.number().int().min(1).max(365).default(30),
});

export type AppEnv = z.infer<typeof envSchema>;

export const validateEnv = (config: Record<string, unknown>): AppEnv => {
  const parsed = envSchema.safeParse(config);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid environment: ${details}`);
  }
  return parsed.data;
};
