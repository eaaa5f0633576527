/**
 * Cover letter templates, one per application template.
 *
 * Both are plain prompt templates: every `{variable}` must be supplied when
 * the letter is rendered.
 */

import { createPromptTemplate, executeTemplate, type PromptTemplate } from '@jobscope/llm';
import type { ApplicationTemplate } from '@jobscope/schemas';

export type CoverLetterVariables = {
  name: string;
  job_title: string;
  company_name: string;
  background_line: string;
  talking_points: string;
  job_specific_fit: string;
  focus_statement: string;
};

export const COVER_LETTER_TEMPLATES: Readonly<Record<ApplicationTemplate, PromptTemplate>> = {
  expertise_led: createPromptTemplate(`Dear Hiring Manager,

I'm excited to apply for the {job_title} position at {company_name}. {background_line}

What I bring to this role:
{talking_points}

{focus_statement}

I'd welcome the opportunity to discuss how my experience can contribute to {company_name}'s success.

Best regards,
{name}`),

  growth_led: createPromptTemplate(`Dear {company_name} Team,

I'm writing to express my strong interest in the {job_title} position. {background_line}

{job_specific_fit}

{focus_statement} I believe this perspective would be valuable for {company_name}.

Looking forward to discussing this opportunity further.

Sincerely,
{name}`),
};

export function renderCoverLetter(template: ApplicationTemplate, variables: CoverLetterVariables): string {
  const { prompt } = executeTemplate(COVER_LETTER_TEMPLATES[template], variables);
  return prompt.trim();
}
