/**
 * Skill Matcher - candidate skills against posting requirements
 *
 * Responsibilities:
 * - Weighted skill-match score (critical requirements count double)
 * - Tier multipliers: expert 1.0, proficient 0.8, developing 0.5
 * - Short skill phrases for requirements the candidate does not cover
 *
 * LLM Usage: None (pure code logic)
 */

import type { CandidateSkills, SkillTier } from '@jobscope/schemas';
import { containsAnyTerm } from '../shared/terms.js';
import { skillTerms, type SkillSynonymTable } from './skill-synonyms.js';

// Substring markers: "ai" alone would fire inside "maintain" or "containerization".
export const CRITICAL_MARKERS = [
  'python',
  'automation',
  'machine learning',
  'artificial intelligence',
  'ai/ml',
];
export const CRITICAL_WEIGHT = 2.0;
export const BASE_WEIGHT = 1.0;
export const NO_REQUIREMENTS_SCORE = 50;
export const MAX_MISSING_SKILLS = 5;

type MatchableTier = Exclude<SkillTier, 'interested'>;

// Tier order is match order: the first tier with a matching skill wins.
export const TIER_MULTIPLIERS: ReadonlyArray<readonly [MatchableTier, number]> = [
  ['expert', 1.0],
  ['proficient', 0.8],
  ['developing', 0.5],
];

export interface SkillMatch {
  skill: string;
  tier: MatchableTier;
  multiplier: number;
}

export interface SkillMatchResult {
  score: number;
  missing: string[];
}

export function requirementWeight(requirement: string): number {
  return containsAnyTerm(requirement.toLowerCase(), CRITICAL_MARKERS) ? CRITICAL_WEIGHT : BASE_WEIGHT;
}

export function findMatchingSkill(
  requirement: string,
  skills: CandidateSkills,
  synonyms: SkillSynonymTable = {},
): SkillMatch | null {
  const text = requirement.toLowerCase();
  for (const [tier, multiplier] of TIER_MULTIPLIERS) {
    for (const skill of skills[tier]) {
      if (containsAnyTerm(text, skillTerms(skill, synonyms))) {
        return { skill, tier, multiplier };
      }
    }
  }
  return null;
}

export function scoreSkillMatch(
  skills: CandidateSkills,
  requirements: readonly string[],
  synonyms: SkillSynonymTable = {},
): number {
  let matchedWeight = 0;
  let totalWeight = 0;

  for (const requirement of requirements) {
    const weight = requirementWeight(requirement);
    totalWeight += weight;
    const match = findMatchingSkill(requirement, skills, synonyms);
    if (match) matchedWeight += weight * match.multiplier;
  }

  if (totalWeight === 0) return NO_REQUIREMENTS_SCORE;
  return Math.min(100, (matchedWeight / totalWeight) * 100);
}

const SKILL_PHRASE_PATTERNS: readonly RegExp[] = [
  /experience\s+(?:with|in)\s+([^,\n]+)/,
  /knowledge\s+of\s+([^,\n]+)/,
  /proficient\s+(?:in|with)\s+([^,\n]+)/,
  /familiar\s+with\s+([^,\n]+)/,
  /(\w+(?:\s+\w+)?)\s+experience/,
  /(\w+(?:\s+\w+)?)\s+skills?/,
];

/** Core skill named by a requirement, e.g. "knowledge of terraform" -> "terraform". */
export function extractSkillPhrase(requirement: string): string | null {
  const text = requirement.toLowerCase();
  for (const pattern of SKILL_PHRASE_PATTERNS) {
    const phrase = pattern.exec(text)?.[1]?.trim();
    if (phrase && phrase.length > 2 && phrase.length < 30) return phrase;
  }
  return null;
}

export function findMissingSkills(
  skills: CandidateSkills,
  requirements: readonly string[],
  synonyms: SkillSynonymTable = {},
): string[] {
  const missing: string[] = [];
  for (const requirement of requirements) {
    if (findMatchingSkill(requirement, skills, synonyms)) continue;
    const phrase = extractSkillPhrase(requirement);
    if (phrase && !missing.includes(phrase)) missing.push(phrase);
    if (missing.length === MAX_MISSING_SKILLS) break;
  }
  return missing;
}

export function matchSkills(
  skills: CandidateSkills,
  requirements: readonly string[],
  synonyms: SkillSynonymTable = {},
): SkillMatchResult {
  return {
    score: scoreSkillMatch(skills, requirements, synonyms),
    missing: findMissingSkills(skills, requirements, synonyms),
  };
}
