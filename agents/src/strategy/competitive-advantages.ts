/**
 * Competitive advantages: what the candidate can lead with for this posting.
 * Rules run in order and the first four that fire are kept.
 */

import type { CandidateProfile, CompanyProfile, JobPosting } from '@jobscope/schemas';
import { containsAnyTerm } from '../shared/terms.js';
import { skillDisplayName, skillTerms } from '../rank/skill-synonyms.js';

export const MAX_ADVANTAGES = 4;

export interface AdvantageInput {
  posting: Pick<JobPosting, 'description' | 'requirements'>;
  candidate: CandidateProfile;
  skillMatch: number;
  company: Pick<CompanyProfile, 'values' | 'cultureKeywords'>;
}

interface AdvantageRule {
  name: string;
  evaluate(input: AdvantageInput): string | null;
}

function skillsMentioned(skills: readonly string[], input: AdvantageInput): string[] {
  const text = input.posting.description.toLowerCase();
  return skills
    .filter((s) => containsAnyTerm(text, skillTerms(s, input.candidate.skillSynonyms)))
    .map(skillDisplayName);
}

export function formatList(items: readonly string[]): string {
  const shown = items.slice(0, 3);
  if (shown.length <= 1) return shown.join('');
  return `${shown.slice(0, -1).join(', ')} and ${shown[shown.length - 1]}`;
}

const YEARS_PATTERN = /(\d{1,2})\+?\s*(?:-\s*\d{1,2}\s*)?years?/g;

/** Highest "N years" figure stated in the requirements or description; 0 when none. */
export function highestYearsRequired(posting: AdvantageInput['posting']): number {
  const text = [...posting.requirements, posting.description].join('\n');
  let highest = 0;
  for (const match of text.matchAll(YEARS_PATTERN)) {
    highest = Math.max(highest, Number.parseInt(match[1], 10));
  }
  return highest;
}

export const ADVANTAGE_RULES: readonly AdvantageRule[] = [
  {
    name: 'expert-skills',
    evaluate: (input) => {
      const skills = skillsMentioned(input.candidate.skills.expert, input);
      return skills.length > 0 ? `Expert-level ${formatList(skills)}, named directly in the posting` : null;
    },
  },
  {
    name: 'requirement-coverage',
    evaluate: (input) =>
      input.skillMatch > 50
        ? `Covers most stated requirements (${Math.round(input.skillMatch)}% skill match)`
        : null,
  },
  {
    name: 'experience',
    evaluate: (input) => {
      const required = highestYearsRequired(input.posting);
      const years = input.candidate.experienceYears;
      return required > 0 && years >= required
        ? `${years} years of experience meets the ${required}+ year requirement`
        : null;
    },
  },
  {
    name: 'shared-values',
    evaluate: (input) => {
      const company = new Set(
        [...input.company.values, ...input.company.cultureKeywords].map((v) => v.toLowerCase()),
      );
      const shared = [...new Set(input.candidate.culturePreferences.map((p) => p.toLowerCase()))].filter(
        (p) => company.has(p),
      );
      return shared.length > 0 ? `Shared values with the company: ${formatList(shared)}` : null;
    },
  },
  {
    name: 'developing-skills',
    evaluate: (input) => {
      const skills = skillsMentioned(input.candidate.skills.developing, input);
      return skills.length > 0
        ? `Actively developing ${formatList(skills)}, which this role exercises`
        : null;
    },
  },
  {
    name: 'adaptability',
    evaluate: () => 'Systematic learning approach shows adaptability to new tools and domains',
  },
];

export function identifyCompetitiveAdvantages(input: AdvantageInput): string[] {
  const advantages: string[] = [];
  for (const rule of ADVANTAGE_RULES) {
    const advantage = rule.evaluate(input);
    if (advantage) advantages.push(advantage);
    if (advantages.length === MAX_ADVANTAGES) break;
  }
  return advantages;
}
