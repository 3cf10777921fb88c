import { z } from 'zod';
import { USER_ROLES } from '@gridsearch/shared';
import type { UserRole } from '@gridsearch/shared';

/** One configured Basic-auth account */
export interface AuthUser {
  username: string;
  password: string;
  roles: UserRole[];
}

const roleSchema = z.enum(USER_ROLES);

/** `user:password:ROLE[|ROLE],...`; the password may itself contain colons */
const authUsersSchema = z
  .string()
  .min(1)
  .transform((raw, ctx): AuthUser[] => {
    const users: AuthUser[] = [];
    const entries = raw
      .split(',')
      .map((e) => e.trim())
      .filter(Boolean);

    entries.forEach((entry, i) => {
      const first = entry.indexOf(':');
      const last = entry.lastIndexOf(':');
      if (first <= 0 || last === first || first + 1 === last) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Entry ${i + 1} must look like user:password:ROLE[|ROLE]`,
        });
        return;
      }

      const username = entry.slice(0, first);
      const roles: UserRole[] = [];
      for (const token of entry.slice(last + 1).split('|')) {
        const role = roleSchema.safeParse(token.trim());
        if (!role.success) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Unknown role "${token.trim()}" for user "${username}"`,
          });
          continue;
        }
        roles.push(role.data);
      }

      users.push({ username, password: entry.slice(first + 1, last), roles });
    });

    if (users.length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'At least one user is required' });
    }
    return users;
  });

const booleanFlag = z
  .enum(['true', 'false'])
  .default('true')
  .transform((v) => v === 'true');

const envSchema = z
  .object({
    DATABASE_PATH: z.string().min(1).default('./data/gridsearch.sqlite'),
    DATABASE_SYNCHRONIZE: booleanFlag,
    STORAGE_DRIVER: z.enum(['local', 's3']).default('local'),
    STORAGE_BASE_DIR: z.string().min(1).default('./data/spreadsheets'),
    S3_BUCKET: z.string().min(1).optional(),
    S3_REGION: z.string().min(1).optional(),
    S3_ACCESS_KEY_ID: z.string().min(1).optional(),
    S3_SECRET_ACCESS_KEY: z.string().min(1).optional(),
    S3_ENDPOINT: z.string().optional(),
    S3_PREFIX: z.string().default(''),
    MAX_UPLOAD_SIZE_MB: z.coerce.number().int().min(1).max(200).default(10),
    AUTH_USERS: authUsersSchema,
    CLEANUP_INTERVAL_MINUTES: z.coerce.number().int().min(0).default(60),
    ORPHAN_GRACE_MINUTES: z.coerce.number().int().min(0).default(60),
    PORT: z.coerce.number().int().default(4000),
    FRONTEND_URL: z.string().default('http://localhost:3000'),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  })
  .superRefine((env, ctx) => {
    if (env.STORAGE_DRIVER !== 's3') return;
    const required = ['S3_BUCKET', 'S3_REGION', 'S3_ACCESS_KEY_ID', 'S3_SECRET_ACCESS_KEY'] as const;
    for (const key of required) {
      if (!env[key]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: 'Required when STORAGE_DRIVER is s3',
        });
      }
    }
  });

export type EnvConfig = z.infer<typeof envSchema>;

/** Used as `ConfigModule.forRoot({ validate })`; lists every issue on failure */
export function validateEnv(config: Record<string, unknown> = process.env): EnvConfig {
  const result = envSchema.safeParse(config);
  if (!result.success) {
    const formatted = result.error.issues
      .map((i) => `  ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new Error(`Environment validation failed:\n${formatted}`);
  }
  return result.data;
}
