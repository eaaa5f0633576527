/**
 * Application Writer - tailored application content for an analyzed posting
 *
 * Responsibilities:
 * - Count the candidate's skills per tier that the posting mentions
 * - Pick the cover letter template: expertise-led when expert hits at least
 *   match the other tiers combined, growth-led otherwise
 * - Talking points per tier, a closing growth point naming the company
 * - A job-specific fit paragraph and a focus statement keyed on the posting
 *
 * LLM Usage: None (templates filled from the analysis)
 */

import {
  applicationPackageSchema,
  type ApplicationPackage,
  type ApplicationTemplate,
  type CandidateProfile,
  type JobAnalysis,
  type TierHits,
} from '@jobscope/schemas';
import { agentLog } from '../shared/agent-logs.js';
import { containsAnyTerm, containsTerm } from '../shared/terms.js';
import { skillDisplayName, skillTerms, type SkillSynonymTable } from '../rank/skill-synonyms.js';
import { formatList } from '../strategy/competitive-advantages.js';
import { renderCoverLetter } from './cover-letter-templates.js';

export const FIT_LIST_MIN_POINTS = 3;

type HitTier = keyof TierHits;

export type TierMatches = Record<HitTier, string[]>;

const HIT_TIERS: readonly HitTier[] = ['expert', 'proficient', 'developing'];

const TIER_POINTS: Readonly<Record<HitTier, (skills: string) => string>> = {
  expert: (skills) => `Proven ${skills} expertise, which this posting names directly`,
  proficient: (skills) => `Hands-on ${skills} experience I can apply from day one`,
  developing: (skills) => `Actively building ${skills} skills that this role exercises`,
};

// First topic the description mentions wins.
export const FOCUS_STATEMENTS: ReadonlyArray<readonly [string, string]> = [
  ['automation', 'I focus on building systems that remove manual work and solve real problems through automation.'],
  ['infrastructure', 'I treat reliable infrastructure as the foundation everything else depends on.'],
  ['data', 'I enjoy turning raw data into insights a team can act on.'],
];

export const GENERIC_FOCUS_STATEMENT =
  'I think end to end, from infrastructure through application code, and that carries over to any technical role.';

/** Display names of the candidate's skills, per tier, that `description` mentions. */
export function matchTierSkills(
  description: string,
  skills: CandidateProfile['skills'],
  synonyms: SkillSynonymTable = {},
): TierMatches {
  const text = description.toLowerCase();
  const mentioned = (names: readonly string[]) =>
    names.filter((s) => containsAnyTerm(text, skillTerms(s, synonyms))).map(skillDisplayName);
  return {
    expert: mentioned(skills.expert),
    proficient: mentioned(skills.proficient),
    developing: mentioned(skills.developing),
  };
}

export function countTierHits(matches: TierMatches): TierHits {
  return {
    expert: matches.expert.length,
    proficient: matches.proficient.length,
    developing: matches.developing.length,
  };
}

export function selectTemplate(hits: TierHits): ApplicationTemplate {
  return hits.expert >= hits.proficient + hits.developing ? 'expertise_led' : 'growth_led';
}

export function buildTalkingPoints(matches: TierMatches, company: string): string[] {
  const points: string[] = [];
  for (const tier of HIT_TIERS) {
    if (matches[tier].length > 0) points.push(TIER_POINTS[tier](formatList(matches[tier])));
  }
  points.push(`Growth mindset: I keep my skills current, which is what ${company} needs`);
  return points;
}

export function focusStatement(description: string): string {
  const text = description.toLowerCase();
  for (const [topic, statement] of FOCUS_STATEMENTS) {
    if (containsTerm(text, topic)) return statement;
  }
  return GENERIC_FOCUS_STATEMENT;
}

export function jobSpecificFit(jobTitle: string, points: readonly string[], targetRole?: string): string {
  if (points.length >= FIT_LIST_MIN_POINTS) {
    const bullets = points.slice(0, FIT_LIST_MIN_POINTS).map((p) => `• ${p}`);
    return ['This role particularly appeals to me because:', ...bullets].join('\n');
  }
  const heading = targetRole ? `, toward ${targetRole}` : '';
  return `Your ${jobTitle} role lines up with where my career is heading${heading}, combining what I already do well with what I am learning now.`;
}

export function backgroundLine(candidate: Pick<CandidateProfile, 'experienceYears' | 'currentRole'>): string {
  const role = candidate.currentRole?.trim();
  if (candidate.experienceYears > 0) {
    return `I bring ${candidate.experienceYears} years of experience${role ? `, most recently as ${role}` : ''}.`;
  }
  if (role) return `I bring hands-on experience from my work as ${role}.`;
  return 'I bring hands-on experience with the tools this role relies on.';
}

export function prepareApplication(
  analysis: JobAnalysis,
  candidate: CandidateProfile,
  now: Date = new Date(),
): ApplicationPackage {
  const matches = matchTierSkills(analysis.description, candidate.skills, candidate.skillSynonyms);
  const tierHits = countTierHits(matches);
  const template = selectTemplate(tierHits);
  const talkingPoints = buildTalkingPoints(matches, analysis.company);
  const focus = focusStatement(analysis.description);
  const fit = jobSpecificFit(analysis.title, talkingPoints, candidate.targetRole);

  const coverLetter = renderCoverLetter(template, {
    name: candidate.name ?? 'Applicant',
    job_title: analysis.title,
    company_name: analysis.company,
    background_line: backgroundLine(candidate),
    talking_points: talkingPoints.map((p) => `• ${p}`).join('\n'),
    job_specific_fit: fit,
    focus_statement: focus,
  });

  agentLog('ApplicationWriter', `Prepared ${template} application for "${analysis.title}" at ${analysis.company}`, {
    level: 'debug',
    detail: JSON.stringify(tierHits),
  });

  return applicationPackageSchema.parse({
    jobId: analysis.jobId,
    source: analysis.source,
    jobTitle: analysis.title,
    company: analysis.company,
    overallRating: analysis.overallRating,
    template,
    tierHits,
    talkingPoints,
    focusStatement: focus,
    jobSpecificFit: fit,
    coverLetter,
    generatedAt: now.toISOString(),
  });
}
