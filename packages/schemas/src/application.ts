import { z } from 'zod';

export const applicationTemplateEnum = z.enum(['expertise_led', 'growth_led']);
export type ApplicationTemplate = z.infer<typeof applicationTemplateEnum>;

const hits = z.number().int().min(0);

/** Candidate skills per tier that the posting description mentions. */
export const tierHitsSchema = z.object({
  expert: hits,
  proficient: hits,
  developing: hits,
});

export type TierHits = z.infer<typeof tierHitsSchema>;

export const applicationPackageSchema = z.object({
  jobId: z.string().regex(/^[0-9a-f]{12}$/),
  source: z.string(),
  jobTitle: z.string(),
  company: z.string(),
  overallRating: z.number().min(0).max(100),
  template: applicationTemplateEnum,
  tierHits: tierHitsSchema,
  talkingPoints: z.array(z.string()).min(1),
  focusStatement: z.string(),
  jobSpecificFit: z.string(),
  coverLetter: z.string().min(1),
  generatedAt: z.string().datetime(),
});

export type ApplicationPackage = z.infer<typeof applicationPackageSchema>;
