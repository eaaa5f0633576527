import { z } from 'zod';

export const jobTypeEnum = z.enum(['remote', 'hybrid', 'onsite', 'unknown']);
export type JobType = z.infer<typeof jobTypeEnum>;

export const industryEnum = z.enum([
  'technology',
  'finance',
  'healthcare',
  'ecommerce',
  'enterprise',
  'startup',
  'consulting',
]);
export type Industry = z.infer<typeof industryEnum>;

export const companySizeEnum = z.enum([
  'startup',
  'small',
  'medium',
  'large',
  'very_large',
  'unknown',
]);
export type CompanySize = z.infer<typeof companySizeEnum>;

export const growthStageEnum = z.enum(['startup', 'scale-up', 'mature', 'enterprise']);
export type GrowthStage = z.infer<typeof growthStageEnum>;

export const workEnvironmentEnum = z.enum([
  'collaborative',
  'competitive',
  'innovative',
  'supportive',
  'autonomous',
]);
export type WorkEnvironment = z.infer<typeof workEnvironmentEnum>;

export const skillTierEnum = z.enum(['expert', 'proficient', 'developing', 'interested']);
export type SkillTier = z.infer<typeof skillTierEnum>;

export const strategyTierEnum = z.enum(['high_priority', 'strategic', 'development', 'research']);
export type StrategyTier = z.infer<typeof strategyTierEnum>;

export const optimalTimingEnum = z.enum([
  'immediate',
  'within_24_hours',
  'within_week',
  'after_skill_development',
]);
export type OptimalTiming = z.infer<typeof optimalTimingEnum>;

export const predictionModeEnum = z.enum(['advisor', 'deterministic']);
export type PredictionMode = z.infer<typeof predictionModeEnum>;

export const retrievalStatusEnum = z.enum(['retrieved', 'placeholder']);
export type RetrievalStatus = z.infer<typeof retrievalStatusEnum>;
