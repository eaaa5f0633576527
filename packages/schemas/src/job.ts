import { z } from 'zod';
import { companySizeEnum, industryEnum, jobTypeEnum } from './enums';

const requirementSchema = z.string().min(10).max(199);

export const jobPostingSchema = z.object({
  title: z.string().min(1),
  company: z.string().min(1),
  location: z.string().min(1),
  /** Lowercase, whitespace-normalized; used for keyword search. */
  description: z.string(),
  /** Same text in its original case, for display. */
  displayDescription: z.string(),
  salaryRange: z.string().nullable(),
  jobType: jobTypeEnum,
  requirements: z.array(requirementSchema).max(10),
  preferredQualifications: z.array(requirementSchema).max(8),
  industry: industryEnum,
  companySize: companySizeEnum,
});

export type JobPosting = z.infer<typeof jobPostingSchema>;
