import { z } from 'zod';
import { ValidationError } from '../ingest/errors.js';
import { MAX_LIMIT, MAX_SIMILAR } from '../search/searchEngine.js';

const fileTypes = z.array(z.string().min(1)).max(50).optional();

export const SearchBodySchema = z
  .object({
    query: z.string().trim().min(1, 'must not be empty'),
    limit: z.number().int().min(1).max(MAX_LIMIT).optional(),
    scoreThreshold: z.number().min(0).max(1).optional(),
    fileTypes,
    rerank: z.boolean().optional(),
  })
  .strict();

export const AnalyzeBodySchema = z.object({
  query: z.string(),
});

export const IndexStartBodySchema = z
  .object({
    path: z.string().trim().min(1),
    forceReindex: z.boolean().optional(),
    fileTypes,
  })
  .strict();

const InlineDocumentSchema = z.object({
  id: z.string().trim().min(1),
  text: z.string(),
  sourcePath: z.string().min(1).optional(),
  fileType: z.string().min(1).optional(),
  lastModified: z.string().datetime().optional(),
});

export const IndexBodySchema = z
  .object({
    documents: z.array(InlineDocumentSchema).max(10_000),
    forceReindex: z.boolean().optional(),
    fileTypes,
  })
  .strict()
  .refine(
    (body) => new Set(body.documents.map((doc) => doc.id)).size === body.documents.length,
    { message: 'document ids must be unique', path: ['documents'] },
  );

export const MAX_PAGE_SIZE = 100;
export const MAX_BATCH_DELETE = 100;

export const ListDocumentsQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  size: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(20),
  q: z.string().optional(),
});

export const DocumentDetailsQuerySchema = z.object({
  includeChunks: z
    .enum(['true', 'false'])
    .optional()
    .transform((value) => value === 'true'),
});

export const SimilarQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(MAX_SIMILAR).optional(),
});

export const BatchDeleteBodySchema = z
  .object({
    documentIds: z.array(z.string().trim().min(1)).min(1).max(MAX_BATCH_DELETE),
  })
  .strict();

export const ClearIndexBodySchema = z
  .object({
    confirm: z.literal(true, {
      errorMap: () => ({ message: 'must be true to clear the index' }),
    }),
  })
  .strict();

export type SearchBody = z.infer<typeof SearchBodySchema>;
export type IndexBody = z.infer<typeof IndexBodySchema>;

export function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    throw new ValidationError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`,
      ),
    );
  }
  return parsed.data;
}
