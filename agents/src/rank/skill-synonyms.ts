/**
 * Built-in skill synonyms. Keys use the underscore form candidates write skill
 * names in; a candidate profile can extend the table with `skillSynonyms`.
 * Terms match as substrings, so two-letter forms like "ml" stay out.
 */

export type SkillSynonymTable = Readonly<Record<string, readonly string[]>>;

export const BUILT_IN_SYNONYMS: SkillSynonymTable = {
  python: ['python'],
  automation: ['automation', 'automate', 'scripting', 'scripts'],
  infrastructure: ['infrastructure', 'infra', 'systems', 'sysadmin'],
  machine_learning: ['machine learning', 'artificial intelligence', 'deep learning', 'ai/ml'],
  linux: ['linux', 'unix', 'ubuntu', 'centos', 'redhat'],
  aws: ['aws', 'amazon web services', 'ec2', 's3', 'cloud'],
  docker: ['docker', 'containerization', 'containers'],
  kubernetes: ['kubernetes', 'k8s', 'container orchestration'],
};

function tableKey(skill: string): string {
  return skill.trim().toLowerCase().replace(/\s+/g, '_');
}

/** Readable form of a skill name: `machine_learning` -> `machine learning`. */
export function skillDisplayName(skill: string): string {
  return skill.trim().toLowerCase().replace(/_/g, ' ');
}

/**
 * Every term that counts as a mention of `skill`: its own name plus built-in
 * and candidate-supplied synonyms, lowercased and without duplicates.
 */
export function skillTerms(skill: string, extra: SkillSynonymTable = {}): string[] {
  const key = tableKey(skill);
  const terms = [
    skillDisplayName(skill),
    ...(BUILT_IN_SYNONYMS[key] ?? []),
    ...(extra[key] ?? extra[skill] ?? []),
  ].map((t) => t.trim().toLowerCase());
  return [...new Set(terms.filter(Boolean))];
}
