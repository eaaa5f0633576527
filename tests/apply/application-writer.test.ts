import { describe, it, expect } from 'vitest';
import {
  backgroundLine,
  buildTalkingPoints,
  countTierHits,
  focusStatement,
  GENERIC_FOCUS_STATEMENT,
  jobSpecificFit,
  matchTierSkills,
  prepareApplication,
  renderCoverLetter,
  selectTemplate,
} from '@jobscope/agents';
import { InMemoryApplicationStore } from '@jobscope/core';
import { candidateProfileSchema, type CandidateProfileInput } from '@jobscope/schemas';
import { makeAnalysis } from '../helpers/analysis';

const NOW = new Date('2026-03-04T10:00:00.000Z');

function makeCandidate(overrides: Partial<CandidateProfileInput> = {}) {
  return candidateProfileSchema.parse({
    name: 'Sam Rivera',
    currentRole: 'Infrastructure Engineer',
    experienceYears: 6,
    skills: { expert: ['python', 'aws'], proficient: ['linux'], developing: ['docker'] },
    ...overrides,
  });
}

describe('matchTierSkills', () => {
  it('lists mentioned skills per tier by display name', () => {
    const matches = matchTierSkills(
      'We need Python automation, AWS cloud and machine learning pipelines.',
      candidateProfileSchema.parse({
        skills: { expert: ['python', 'machine_learning'], proficient: ['linux'], developing: ['aws'] },
      }).skills,
    );
    expect(matches).toEqual({ expert: ['python', 'machine learning'], proficient: [], developing: ['aws'] });
    expect(countTierHits(matches)).toEqual({ expert: 2, proficient: 0, developing: 1 });
  });

  it('honours candidate synonyms', () => {
    const candidate = makeCandidate({ skills: { expert: ['terraform'] }, skillSynonyms: { terraform: ['iac'] } });
    expect(matchTierSkills('iac tooling', candidate.skills, candidate.skillSynonyms).expert).toEqual(['terraform']);
  });
});

describe('selectTemplate', () => {
  it.each([
    [{ expert: 0, proficient: 0, developing: 0 }, 'expertise_led'],
    [{ expert: 2, proficient: 1, developing: 1 }, 'expertise_led'],
    [{ expert: 1, proficient: 1, developing: 1 }, 'growth_led'],
    [{ expert: 0, proficient: 1, developing: 0 }, 'growth_led'],
  ] as const)('%j -> %s', (hits, template) => {
    expect(selectTemplate(hits)).toBe(template);
  });
});

describe('talking points and fit', () => {
  it('adds one point per tier with hits, then a growth point', () => {
    const matches = { expert: ['python', 'aws', 'go', 'rust'], proficient: [], developing: ['docker'] };
    expect(buildTalkingPoints(matches, 'Contoso')).toEqual([
      'Proven python, aws and go expertise, which this posting names directly',
      'Actively building docker skills that this role exercises',
      'Growth mindset: I keep my skills current, which is what Contoso needs',
    ]);
  });

  it('lists the first three points when there are enough', () => {
    expect(jobSpecificFit('Analyst', ['one', 'two', 'three', 'four'])).toBe(
      'This role particularly appeals to me because:\n• one\n• two\n• three',
    );
  });

  it('falls back to a sentence about the role', () => {
    expect(jobSpecificFit('Analyst', ['one'])).toBe(
      'Your Analyst role lines up with where my career is heading, combining what I already do well with what I am learning now.',
    );
    expect(jobSpecificFit('Analyst', ['one'], 'Data Scientist')).toBe(
      'Your Analyst role lines up with where my career is heading, toward Data Scientist, combining what I already do well with what I am learning now.',
    );
  });

  it('picks the focus statement from the first matching topic', () => {
    expect(focusStatement('infrastructure automation at scale')).toBe(
      'I focus on building systems that remove manual work and solve real problems through automation.',
    );
    expect(focusStatement('own the data warehouse')).toBe('I enjoy turning raw data into insights a team can act on.');
    expect(focusStatement('design landing pages')).toBe(GENERIC_FOCUS_STATEMENT);
  });

  it('describes the background from experience and role', () => {
    expect(backgroundLine({ experienceYears: 6, currentRole: 'Infrastructure Engineer' })).toBe(
      'I bring 6 years of experience, most recently as Infrastructure Engineer.',
    );
    expect(backgroundLine({ experienceYears: 0, currentRole: 'Analyst' })).toBe(
      'I bring hands-on experience from my work as Analyst.',
    );
    expect(backgroundLine({ experienceYears: 0 })).toBe('I bring hands-on experience with the tools this role relies on.');
  });
});

describe('renderCoverLetter', () => {
  it('fills every placeholder of the growth-led template', () => {
    const letter = renderCoverLetter('growth_led', {
      name: 'Sam',
      job_title: 'Analyst',
      company_name: 'Contoso',
      background_line: 'I bring 2 years of experience.',
      talking_points: '',
      job_specific_fit: 'Fit.',
      focus_statement: 'Focus.',
    });
    expect(letter).toBe(
      [
        'Dear Contoso Team,',
        '',
        "I'm writing to express my strong interest in the Analyst position. I bring 2 years of experience.",
        '',
        'Fit.',
        '',
        'Focus. I believe this perspective would be valuable for Contoso.',
        '',
        'Looking forward to discussing this opportunity further.',
        '',
        'Sincerely,',
        'Sam',
      ].join('\n'),
    );
  });
});

describe('prepareApplication', () => {
  it('writes an expertise-led letter when expert skills dominate', () => {
    const analysis = makeAnalysis({
      title: 'Automation Engineer',
      company: 'Acme Robotics',
      description: 'we need python automation and aws cloud infrastructure. docker a plus.',
    });
    const pkg = prepareApplication(analysis, makeCandidate(), NOW);

    expect(pkg.template).toBe('expertise_led');
    expect(pkg.tierHits).toEqual({ expert: 2, proficient: 0, developing: 1 });
    expect(pkg.talkingPoints).toEqual([
      'Proven python and aws expertise, which this posting names directly',
      'Actively building docker skills that this role exercises',
      'Growth mindset: I keep my skills current, which is what Acme Robotics needs',
    ]);
    expect(pkg.coverLetter).toBe(
      [
        'Dear Hiring Manager,',
        '',
        "I'm excited to apply for the Automation Engineer position at Acme Robotics. I bring 6 years of experience, most recently as Infrastructure Engineer.",
        '',
        'What I bring to this role:',
        '• Proven python and aws expertise, which this posting names directly',
        '• Actively building docker skills that this role exercises',
        '• Growth mindset: I keep my skills current, which is what Acme Robotics needs',
        '',
        'I focus on building systems that remove manual work and solve real problems through automation.',
        '',
        "I'd welcome the opportunity to discuss how my experience can contribute to Acme Robotics's success.",
        '',
        'Best regards,',
        'Sam Rivera',
      ].join('\n'),
    );
    expect(pkg).toMatchObject({
      jobId: analysis.jobId,
      source: analysis.source,
      jobTitle: 'Automation Engineer',
      company: 'Acme Robotics',
      overallRating: analysis.overallRating,
      generatedAt: '2026-03-04T10:00:00.000Z',
    });
  });

  it('writes a growth-led letter when learning skills dominate', () => {
    const analysis = makeAnalysis({
      title: 'Site Reliability Engineer',
      company: 'Northwind',
      description: 'maintain linux servers and keep the infrastructure healthy',
    });
    const candidate = makeCandidate({
      name: undefined,
      currentRole: undefined,
      targetRole: 'Platform Engineer',
      experienceYears: 0,
      skills: { expert: ['python'], proficient: ['linux'] },
    });
    const pkg = prepareApplication(analysis, candidate, NOW);

    const fit =
      'Your Site Reliability Engineer role lines up with where my career is heading, toward Platform Engineer, combining what I already do well with what I am learning now.';
    expect(pkg.template).toBe('growth_led');
    expect(pkg.tierHits).toEqual({ expert: 0, proficient: 1, developing: 0 });
    expect(pkg.jobSpecificFit).toBe(fit);
    expect(pkg.coverLetter).toBe(
      [
        'Dear Northwind Team,',
        '',
        "I'm writing to express my strong interest in the Site Reliability Engineer position. I bring hands-on experience with the tools this role relies on.",
        '',
        fit,
        '',
        'I treat reliable infrastructure as the foundation everything else depends on. I believe this perspective would be valuable for Northwind.',
        '',
        'Looking forward to discussing this opportunity further.',
        '',
        'Sincerely,',
        'Applicant',
      ].join('\n'),
    );
  });

  it('saves through an application store', async () => {
    const store = new InMemoryApplicationStore();
    const pkg = prepareApplication(makeAnalysis(), makeCandidate(), NOW);
    await store.save(pkg);
    expect(await store.list()).toEqual([pkg]);
  });
});
