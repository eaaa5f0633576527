import { describe, it, expect } from 'vitest';
import {
  createPlaceholderPosting,
  extractJobPosting,
  loadPostingDocument,
  looksLikeHtml,
  DEFAULT_COMPANY,
  DEFAULT_LOCATION,
  DEFAULT_TITLE,
} from '@jobscope/agents';

const PLAIN_TEXT_POSTING = `Title: Senior Automation Engineer
Company: Acme Robotics Inc
Location: Austin, TX (Hybrid)

About the role
We are a fast-paced startup building cloud automation software.

Requirements:
- 5+ years of Python experience
- Experience with AWS and Terraform
- Strong Linux skills

Preferred Qualifications:
- Kubernetes certification or equivalent
- Familiar with Docker

Salary: $120,000 - $150,000 per year`;

const HTML_POSTING = `<!doctype html>
<html>
<head>
  <title>Careers</title>
  <meta property="og:site_name" content="Globex Careers">
</head>
<body>
  <div class="job-header"><h1 class="job-title">  Machine Learning   Engineer </h1></div>
  <div class="company-name">Globex Corporation</div>
  <div class="job-location">Remote - US</div>
  <div class="job-description">
    <p>Join our research team.</p>
    <h3>Requirements:</h3>
    <ul><li>3+ years of experience with PyTorch</li><li>Bachelor's degree in Computer Science</li></ul>
  </div>
  <footer>Salary 90k - 120k USD</footer>
</body>
</html>`;

const JSON_LD_POSTING = `<html><head><script type="application/ld+json">{"@context":"https://schema.org","@type":"JobPosting","title":"Data Engineer","hiringOrganization":{"@type":"Organization","name":"Initech"},"jobLocation":{"@type":"Place","address":{"addressLocality":"Denver","addressRegion":"CO","addressCountry":"US"}},"description":"<p>Build pipelines.</p><p>Requirements:</p><ul><li>Experience with Spark and Airflow</li></ul>"}</script></head><body><h1>Ignored Heading</h1></body></html>`;

describe('extractJobPosting', () => {
  describe('plain text', () => {
    const posting = extractJobPosting(PLAIN_TEXT_POSTING);

    it('reads labelled header fields', () => {
      expect(posting.title).toBe('Senior Automation Engineer');
      expect(posting.company).toBe('Acme Robotics Inc');
      expect(posting.location).toBe('Austin, TX (Hybrid)');
    });

    it('keeps the lowercase description beside the display text', () => {
      expect(posting.displayDescription).toBe(PLAIN_TEXT_POSTING);
      expect(posting.description).toBe(PLAIN_TEXT_POSTING.toLowerCase());
    });

    it('collects requirement bullets and phrase matches without duplicates', () => {
      expect(posting.requirements).toEqual([
        '5+ years of python experience',
        'experience with aws and terraform',
        'strong linux skills',
      ]);
    });

    it('keeps preferred qualifications separate from requirements', () => {
      expect(posting.preferredQualifications).toEqual([
        'kubernetes certification or equivalent',
        'familiar with docker',
      ]);
    });

    it('classifies salary, job type, industry and size', () => {
      expect(posting.salaryRange).toBe('$120,000 - $150,000');
      expect(posting.jobType).toBe('hybrid');
      expect(posting.industry).toBe('technology');
      expect(posting.companySize).toBe('startup');
    });
  });

  describe('plain text naming tags', () => {
    const raw = `Title: Frontend Engineer
Company: Contoso
Location: Lisbon

Requirements:
- Semantic markup with <section> and <article> elements
- Accessibility audits`;

    it('stays plain text when tags only appear in prose', () => {
      expect(looksLikeHtml(raw)).toBe(false);
      expect(loadPostingDocument(raw).kind).toBe('text');
    });

    it('reads labelled header fields', () => {
      const posting = extractJobPosting(raw);
      expect(posting.title).toBe('Frontend Engineer');
      expect(posting.company).toBe('Contoso');
      expect(posting.location).toBe('Lisbon');
      expect(posting.requirements).toEqual([
        'semantic markup with <section> and <article> elements',
        'accessibility audits',
      ]);
    });

    it('still treats documents that open with markup as html', () => {
      expect(looksLikeHtml('  <div class="job">Engineer</div>')).toBe(true);
      expect(looksLikeHtml('<!doctype html><html></html>')).toBe(true);
    });
  });

  describe('html', () => {
    const posting = extractJobPosting(HTML_POSTING);

    it('uses selector rules for header fields', () => {
      expect(posting.title).toBe('Machine Learning Engineer');
      expect(posting.company).toBe('Globex Corporation');
      expect(posting.location).toBe('Remote - US');
    });

    it('renders the description region with list bullets', () => {
      expect(posting.displayDescription).toBe(
        "Join our research team.\n\nRequirements:\n\n• 3+ years of experience with PyTorch\n• Bachelor's degree in Computer Science",
      );
    });

    it('extracts section items before phrase matches', () => {
      expect(posting.requirements).toEqual([
        '3+ years of experience with pytorch',
        "bachelor's degree in computer science",
        'experience with pytorch',
      ]);
      expect(posting.preferredQualifications).toEqual([]);
    });

    it('reads salary and job type from the whole page', () => {
      expect(posting.salaryRange).toBe('90k - 120k USD');
      expect(posting.jobType).toBe('remote');
    });

    it('falls back to the corporate suffix for company size', () => {
      expect(posting.companySize).toBe('medium');
      expect(posting.industry).toBe('technology');
    });
  });

  describe('json-ld', () => {
    const posting = extractJobPosting(JSON_LD_POSTING);

    it('prefers the structured block over page headings', () => {
      expect(posting.title).toBe('Data Engineer');
      expect(posting.company).toBe('Initech');
      expect(posting.location).toBe('Denver, CO, US');
    });

    it('converts the description markup to text', () => {
      expect(posting.displayDescription).toBe(
        'Build pipelines.\n\nRequirements:\n\n• Experience with Spark and Airflow',
      );
      expect(posting.requirements).toEqual(['experience with spark and airflow']);
    });

    it('classifies job type from the visible page', () => {
      expect(posting.jobType).toBe('onsite');
    });
  });

  describe('degenerate input', () => {
    it('fills defaults for an empty document', () => {
      const posting = extractJobPosting('');
      expect(posting.title).toBe(DEFAULT_TITLE);
      expect(posting.company).toBe(DEFAULT_COMPANY);
      expect(posting.location).toBe(DEFAULT_LOCATION);
      expect(posting.description).toBe('');
      expect(posting.requirements).toEqual([]);
      expect(posting.preferredQualifications).toEqual([]);
      expect(posting.salaryRange).toBeNull();
      expect(posting.jobType).toBe('unknown');
      expect(posting.companySize).toBe('unknown');
    });

    it('is idempotent', () => {
      expect(extractJobPosting(HTML_POSTING)).toEqual(extractJobPosting(HTML_POSTING));
      expect(extractJobPosting(PLAIN_TEXT_POSTING)).toEqual(extractJobPosting(PLAIN_TEXT_POSTING));
    });
  });
});

describe('createPlaceholderPosting', () => {
  it('describes an unretrievable posting', () => {
    const posting = createPlaceholderPosting();
    expect(posting.title).toBe('Job Position');
    expect(posting.company).toBe('Company');
    expect(posting.displayDescription).toBe('Job description could not be retrieved');
    expect(posting.description).toBe('job description could not be retrieved');
    expect(posting.jobType).toBe('unknown');
    expect(posting.requirements).toEqual([]);
  });
});
