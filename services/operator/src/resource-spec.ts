import { z } from 'zod';
import type { DesiredStateObject } from '@forgeline/shared';

export const DEFAULT_BUILD_COMMAND = 'npm run build';
export const DEFAULT_OUTPUT_DIR = 'dist';

// ---------------------------------------------------------------------------
// API objects
// ---------------------------------------------------------------------------

const resourceObjectSchema = z
  .object({
    apiVersion: z.string().optional(),
    kind: z.string().optional(),
    metadata: z
      .object({
        name: z.string().min(1),
        namespace: z.string().optional(),
        uid: z.string().optional(),
        resourceVersion: z.string().optional(),
      })
      .passthrough(),
    spec: z.record(z.unknown()).optional(),
    status: z
      .object({
        phase: z.string().optional(),
        message: z.string().optional(),
        jobName: z.string().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

/** Validate an object returned by the API server. Returns undefined for anything without a name. */
export function parseResourceObject(raw: unknown): DesiredStateObject | undefined {
  const result = resourceObjectSchema.safeParse(raw);
  return result.success ? result.data : undefined;
}

// ---------------------------------------------------------------------------
// StaticSite
// ---------------------------------------------------------------------------

const gitSourceSchema = z.object({
  type: z.literal('git'),
  git: z.object({
    repository: z.string().min(1),
    branch: z.string().min(1).optional(),
    path: z.string().min(1).optional(),
  }),
});

const dockerSourceSchema = z.object({
  type: z.literal('docker'),
  docker: z.object({
    image: z.string().min(1),
    path: z.string().min(1).optional(),
  }),
});

const archiveSourceSchema = z.object({
  type: z.literal('archive'),
  archive: z.object({
    url: z.string().min(1),
    path: z.string().min(1).optional(),
  }),
});

const sourceSchema = z.discriminatedUnion('type', [gitSourceSchema, dockerSourceSchema, archiveSourceSchema]);

const legacyUrlSourceSchema = z.object({
  type: z.literal('url'),
  url: z.object({ archive: z.unknown(), path: z.unknown() }).partial().optional(),
});

/** Older manifests describe archives as `{ type: 'url', url: { archive, path } }`. */
function upgradeLegacySource(raw: unknown): unknown {
  const legacy = legacyUrlSourceSchema.safeParse(raw);
  if (!legacy.success) return raw;
  return {
    type: 'archive',
    archive: { url: legacy.data.url?.archive, path: legacy.data.url?.path },
  };
}

const buildSchema = z
  .object({
    enabled: z.boolean().optional(),
    command: z.string().optional(),
    outputDir: z.string().optional(),
  })
  .optional()
  .transform((build) => ({
    enabled: build?.enabled ?? false,
    command: build?.command || DEFAULT_BUILD_COMMAND,
    outputDir: build?.outputDir || DEFAULT_OUTPUT_DIR,
  }));

const staticSiteSpecSchema = z.object({
  source: z.preprocess(upgradeLegacySource, sourceSchema),
  build: buildSchema,
  spa: z.boolean().optional(),
});

export type SourceSpec = z.output<typeof sourceSchema>;
export type StaticSiteSpec = z.output<typeof staticSiteSpecSchema>;

// ---------------------------------------------------------------------------
// ResearchSession
// ---------------------------------------------------------------------------

const researchSessionSpecSchema = z.object({
  prompt: z.string().min(1),
  websiteURL: z.string().min(1),
  llmSettings: z
    .object({
      model: z.string().min(1).default('claude-3-5-sonnet-20241022'),
      temperature: z.number().min(0).max(2).default(0.7),
      maxTokens: z.number().int().positive().default(4000),
    })
    .default({}),
  timeout: z.number().int().positive().default(300),
  displayName: z.string().optional(),
  traceSettings: z
    .object({
      enabled: z.boolean().default(false),
      retention: z.string().default('7d'),
    })
    .optional(),
});

export type ResearchSessionSpec = z.output<typeof researchSessionSpecSchema>;

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

export type SpecDecodeResult<TSpec> =
  | { ok: true; spec: TSpec }
  | { ok: false; error: string };

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length ? issue.path.join('.') : 'spec'}: ${issue.message}`)
    .join('; ');
}

function decodeWith<TSchema extends z.ZodTypeAny>(
  schema: TSchema,
  raw: unknown,
): SpecDecodeResult<z.output<TSchema>> {
  const result = schema.safeParse(raw ?? {});
  if (result.success) return { ok: true, spec: result.data };
  return { ok: false, error: describeIssues(result.error) };
}

export function decodeStaticSiteSpec(raw: unknown): SpecDecodeResult<StaticSiteSpec> {
  return decodeWith(staticSiteSpecSchema, raw);
}

export function decodeResearchSessionSpec(raw: unknown): SpecDecodeResult<ResearchSessionSpec> {
  return decodeWith(researchSessionSpecSchema, raw);
}
