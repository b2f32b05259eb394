import { z } from 'zod';

/**
 * One problem row: [pid, pnum, title, ...statistics]
 */
export const ProblemRowSchema = z
  .tuple([z.number().int(), z.number().int(), z.string()])
  .rest(z.unknown());

export const ProblemPayloadSchema = z
  .array(ProblemRowSchema)
  .min(1, { message: 'Problem database was empty' });

export type ProblemRow = z.infer<typeof ProblemRowSchema>;

export const CategoryProblemSchema = z.object({
  pnum: z.number().int(),
  note: z.string().optional(),
  star: z.boolean().optional(),
});

export type CategoryProblem = z.infer<typeof CategoryProblemSchema>;

export interface RawCategoryNode {
  name: string;
  note?: string;
  branches?: RawCategoryNode[];
  problems?: CategoryProblem[];
}

export const CategoryNodeSchema: z.ZodType<RawCategoryNode> = z.lazy(() =>
  z.object({
    name: z.string().min(1),
    note: z.string().optional(),
    branches: z.array(CategoryNodeSchema).optional(),
    problems: z.array(CategoryProblemSchema).optional(),
  }),
);

/**
 * Category index: category file name -> version
 */
export const CategoryIndexSchema = z.record(z.number().int());

export type CategoryIndex = z.infer<typeof CategoryIndexSchema>;

export const PreferencesSchema = z.object({
  favorites: z.array(z.number().int()).default([]),
  categoryVersions: z.record(z.number().int()).default({}),
});

export type Preferences = z.infer<typeof PreferencesSchema>;
