import { z } from 'zod';

const skillListSchema = z.array(z.string().trim().min(1)).default([]);

export const candidateSkillsSchema = z
  .object({
    expert: skillListSchema,
    proficient: skillListSchema,
    developing: skillListSchema,
    interested: skillListSchema,
  })
  .superRefine((skills, ctx) => {
    const seen = new Set<string>();
    for (const name of [
      ...skills.expert,
      ...skills.proficient,
      ...skills.developing,
      ...skills.interested,
    ]) {
      const key = name.toLowerCase();
      if (seen.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Skill "${name}" is listed in more than one tier`,
        });
      }
      seen.add(key);
    }
  });

export type CandidateSkills = z.infer<typeof candidateSkillsSchema>;

export const candidateProfileSchema = z.object({
  name: z.string().optional(),
  currentRole: z.string().optional(),
  targetRole: z.string().optional(),
  /** Free-text summary handed to the advisor prompt. */
  background: z.string().optional(),
  skills: candidateSkillsSchema,
  skillSynonyms: z.record(z.array(z.string().min(1))).default({}),
  culturePreferences: z.array(z.string().trim().min(1)).default([]),
  experienceYears: z.number().int().min(0).default(0),
  applicationSuccessRate: z.number().min(0).max(1).default(0.15),
});

export type CandidateProfile = z.infer<typeof candidateProfileSchema>;
/** Shape accepted from disk, before defaults are applied. */
export type CandidateProfileInput = z.input<typeof candidateProfileSchema>;
