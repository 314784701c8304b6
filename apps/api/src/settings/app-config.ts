import { z } from 'zod';
import { UNRESOLVED_LINK_POLICIES } from '../reconcile/upsert-resolver';
import type { UnresolvedLinkPolicy } from '../reconcile/upsert-resolver';

const UnresolvedPolicySchema = z.custom<UnresolvedLinkPolicy>(
  (value) => UNRESOLVED_LINK_POLICIES.some((p) => p === value),
  { message: `Expected one of: ${UNRESOLVED_LINK_POLICIES.join(', ')}` },
);

const HttpUrlSchema = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), {
    message: 'Expected an http(s) URL',
  });

/** Resolved runtime configuration, after file, env and CLI flags are merged. */
export const AppConfigSchema = z.object({
  dataDir: z.string().min(1),
  databasePath: z.string().min(1),
  unresolvedPolicy: UnresolvedPolicySchema,
  plex: z.object({
    baseUrl: HttpUrlSchema.nullable(),
    token: z.string().min(1).nullable(),
  }),
  sonarr: z.object({
    baseUrl: HttpUrlSchema.nullable(),
    apiKey: z.string().min(1).nullable(),
  }),
  filesystem: z.object({
    dirs: z.array(z.string().min(1)),
  }),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

/** Shape of the optional YAML config file. */
export const ConfigFileSchema = z
  .object({
    database: z.string().min(1).optional(),
    unresolved_policy: UnresolvedPolicySchema.optional(),
    plex: z
      .object({
        url: z.string().optional(),
        token: z.string().optional(),
      })
      .strict()
      .optional(),
    sonarr: z
      .object({
        url: z.string().optional(),
        api_key: z.string().optional(),
      })
      .strict()
      .optional(),
    filesystem: z
      .object({
        dirs: z.array(z.string().min(1)).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((i) => `${i.path.length ? i.path.join('.') : '(root)'}: ${i.message}`)
    .join('; ');
}
