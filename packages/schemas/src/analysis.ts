import { z } from 'zod';
import {
  optimalTimingEnum,
  predictionModeEnum,
  retrievalStatusEnum,
  strategyTierEnum,
} from './enums';
import { jobPostingSchema } from './job';

const score = z.number().min(0).max(100);

export const jobAnalysisSchema = jobPostingSchema.extend({
  jobId: z.string().regex(/^[0-9a-f]{12}$/),
  source: z.string(),
  analyzedAt: z.string().datetime(),
  skillMatchScore: score,
  cultureFitScore: score,
  growthPotentialScore: score,
  successProbability: score,
  overallRating: score,
  requiredSkillsMissing: z.array(z.string()).max(5),
  competitiveAdvantages: z.array(z.string()).max(4),
  applicationStrategy: z.string(),
  strategyTier: strategyTierEnum,
  optimalTiming: optimalTimingEnum,
  followUpStrategy: z.string(),
  priorityLevel: z.number().int().min(1).max(5),
  successPredictionMode: predictionModeEnum,
  retrievalStatus: retrievalStatusEnum,
});

export type JobAnalysis = z.infer<typeof jobAnalysisSchema>;
