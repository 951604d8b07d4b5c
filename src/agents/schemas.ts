import { z } from 'zod';

const nullableString = z.string().nullable().optional();
// volume, issue and pages are often returned as numbers
const nullableText = z.union([z.string(), z.number()]).nullable().optional();

export const MetadataSchema = z.object({
  title: nullableString,
  first_author_lastname: nullableString,
  authors: z.array(z.string()).nullable().optional(),
  publication_year: z.number().int().nullable().optional(),
  doi: nullableString,
  journal: nullableString,
  volume: nullableText,
  issue: nullableText,
  pages: nullableText,
  issn: nullableString,
  publisher: nullableString,
  bibliography: z.array(z.string()).nullable().optional(),
  language: nullableString,
});

export type MetadataOutput = z.infer<typeof MetadataSchema>;

export const DedupJudgementSchema = z.object({
  unique_indices: z.array(z.number().int()).nullable().optional(),
  all_duplicates: z.boolean().optional(),
});

export type DedupJudgement = z.infer<typeof DedupJudgementSchema>;
