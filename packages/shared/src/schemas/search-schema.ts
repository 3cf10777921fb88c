import { z } from 'zod';
import { SEARCH_LIMITS } from '../constants/limits';
import { parseKeywords } from '../utils/keyword-utils';

const pageSchema = z.coerce
  .number()
  .int()
  .min(0)
  .max(SEARCH_LIMITS.MAX_PAGE, { message: `page must be at most ${SEARCH_LIMITS.MAX_PAGE}` })
  .default(0);
const pageSizeSchema = z.coerce
  .number()
  .int()
  .min(1)
  .max(SEARCH_LIMITS.MAX_PAGE_SIZE)
  .default(SEARCH_LIMITS.DEFAULT_PAGE_SIZE);

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

/** Query string of GET /search; `keywords` is comma-separated */
export const searchQuerySchema = z
  .object({
    keywords: z.string().max(SEARCH_LIMITS.MAX_KEYWORDS_LENGTH),
    fileId: optionalText,
    sheetName: optionalText,
    page: pageSchema,
    pageSize: pageSizeSchema,
  })
  .transform((q, ctx) => {
    const keywords = parseKeywords(q.keywords);
    if (keywords.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['keywords'],
        message: 'At least one keyword is required for search',
      });
      return z.NEVER;
    }
    if (keywords.length > SEARCH_LIMITS.MAX_KEYWORDS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['keywords'],
        message: `Too many keywords: ${keywords.length} (max: ${SEARCH_LIMITS.MAX_KEYWORDS})`,
      });
      return z.NEVER;
    }
    return { ...q, keywords };
  });

/** Query string of GET / (file listing) */
export const fileListQuerySchema = z.object({
  uploadedBy: optionalText,
  page: pageSchema,
  pageSize: pageSizeSchema,
});

export type SearchQueryInput = z.infer<typeof searchQuerySchema>;
export type FileListQueryInput = z.infer<typeof fileListQuerySchema>;
