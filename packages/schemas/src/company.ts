import { z } from 'zod';
import { companySizeEnum, growthStageEnum, industryEnum, workEnvironmentEnum } from './enums';

const score = z.number().min(0).max(100);

export const storedCompanyProfileSchema = z.object({
  name: z.string().min(1),
  values: z.array(z.string()).max(5),
  cultureKeywords: z.array(z.string()),
  workEnvironment: workEnvironmentEnum,
  growthStage: growthStageEnum,
  techStack: z.array(z.string()),
  innovationScore: score,
  industry: industryEnum,
  size: companySizeEnum,
});

/** What the company store keeps: everything except the candidate-relative score. */
export type StoredCompanyProfile = z.infer<typeof storedCompanyProfileSchema>;

export const companyProfileSchema = storedCompanyProfileSchema.extend({
  cultureMatchScore: score,
});

export type CompanyProfile = z.infer<typeof companyProfileSchema>;
