import { z } from 'zod';

export const ArticleEntrySchema = z.union([
  z.number(),
  z.object({
    id: z.number().int().optional(),
    weight: z.number(),
  }),
]);

const ArticleListSchema = z.array(ArticleEntrySchema);

/** A bare list, or `{ articles: [...] }`. */
export const ArticleFileSchema = z.union([
  ArticleListSchema,
  z.object({ articles: ArticleListSchema }).transform(file => file.articles),
]);

export type ArticleEntry = z.infer<typeof ArticleEntrySchema>;

export function parseArticleFile(data: unknown): ArticleEntry[] {
  return ArticleFileSchema.parse(data);
}
