/**
 * Oracle Prompts
 *
 * One builder per prompt kind. Every prompt asks for a single JSON document;
 * the matching response schema lives in ../validation/schemas.
 */

import {
  buildStructuredPrompt,
  escapePromptText,
  formatList,
  truncateText
} from '../../shared/llm/prompts';
import type { JobRequirement, WorkHistoryEntry } from '../types';

export type OraclePromptKind =
  | 'resume_profile'
  | 'work_history'
  | 'skill_experience'
  | 'job_requirements'
  | 'evidence_grade'
  | 'skill_variants';

/**
 * Appended when a response could not be parsed
 */
export const STRICT_JSON_SUFFIX =
  'IMPORTANT: Your previous answer was not valid JSON. Respond with ONLY the JSON document described above. ' +
  'No markdown fences, no commentary, no trailing text.';

export const MAX_RESUME_CHARS = 100000;
export const MAX_JOB_DESCRIPTION_CHARS = 20000;
export const MAX_VARIANT_CANDIDATES = 50;
export const MAX_QUOTE_WORDS = 25;

export function buildResumeProfilePrompt(resumeText: string): string {
  return buildStructuredPrompt(
    'You are an expert technical recruiter. Extract a profile of the candidate from the resume below.',
    [
      'Extract skills from EVERY part of the resume: summary, skills lists, job descriptions and projects',
      'Use the canonical name of each skill (e.g. "PostgreSQL", not "postgres")',
      'List each skill once; treat names differing only in case as the same skill',
      'years_exp is the total years of professional experience as a number',
      'certifications and projects are empty arrays when the resume lists none'
    ],
    [{ title: 'Resume', body: truncateText(escapePromptText(resumeText), MAX_RESUME_CHARS) }],
    `{
  "name": "candidate name",
  "title": "current or most recent job title",
  "years_exp": 0,
  "skills": ["skill"],
  "certifications": ["certification"],
  "projects": ["project"]
}`
  );
}

export function buildWorkHistoryPrompt(resumeText: string): string {
  return buildStructuredPrompt(
    'You are an expert technical recruiter. Extract the candidate\'s work history from the resume below.',
    [
      'Include every job, most recent first',
      'Dates are YYYY-MM when the month is known, otherwise YYYY',
      'end_date is null for the current job',
      'duration_months is the number of months in the role, counting both the first and last month',
      'technologies lists the tools, languages and platforms used in that job'
    ],
    [{ title: 'Resume', body: truncateText(escapePromptText(resumeText), MAX_RESUME_CHARS) }],
    `{
  "jobs": [
    {
      "company": "company name",
      "title": "job title",
      "start_date": "YYYY-MM",
      "end_date": "YYYY-MM or null",
      "duration_months": 0,
      "technologies": ["technology"]
    }
  ]
}`
  );
}

function describeJob(entry: WorkHistoryEntry): string {
  const period = `${entry.startPeriod ?? 'unknown'} to ${entry.endPeriod ?? 'present'}`;
  return `${entry.title} at ${entry.company} (${period}, ${entry.durationMonths} months)`;
}

export function buildSkillExperiencePrompt(
  skills: readonly string[],
  workHistory: readonly WorkHistoryEntry[],
  resumeText: string
): string {
  const sections = [{ title: 'Skills', body: formatList(skills) }];
  if (workHistory.length > 0) {
    sections.push({ title: 'Work history', body: formatList(workHistory.map(describeJob)) });
  }
  sections.push({ title: 'Resume', body: truncateText(escapePromptText(resumeText), MAX_RESUME_CHARS) });

  return buildStructuredPrompt(
    'For each skill below, find the jobs in which the candidate actually used it.',
    [
      'Only count a job when the resume shows the skill being USED in that job, not merely listed',
      'Scan ALL jobs for every skill',
      'A skill that was not used in any job gets an empty jobs_using_skill array',
      'Dates are YYYY-MM; end_date is null for the current job',
      'evidence is a short phrase from the resume showing the skill in use',
      'Return one key per skill, spelled exactly as given'
    ],
    sections,
    `{
  "Skill Name": {
    "jobs_using_skill": [
      {
        "company": "company name",
        "start_date": "YYYY-MM",
        "end_date": "YYYY-MM or null",
        "duration_months": 0,
        "evidence": "phrase from the resume"
      }
    ]
  }
}`
  );
}

export function buildJobRequirementsPrompt(jobDescription: string): string {
  return buildStructuredPrompt(
    'You are an expert technical recruiter. Extract the skill requirements from the job description below.',
    [
      'core_skills are the skills the role cannot do without',
      'secondary_skills are required but less central',
      'nice_to_have_skills are preferred, bonus or "a plus"',
      'importance is one of: critical, required, preferred',
      'min_years is the minimum years asked for that skill, or 0 when not stated',
      'variants lists other names that satisfy the requirement (e.g. ".NET" also covers ".NET Core"; ' +
        '"AWS" covers "Amazon Web Services"; "PostgreSQL" covers "Postgres"; "Kubernetes" covers "K8s"; ' +
        '"CI/CD" covers "continuous integration")',
      'experience_requirements.total_years is the total years of experience asked for, or 0'
    ],
    [{ title: 'Job description', body: truncateText(escapePromptText(jobDescription), MAX_JOB_DESCRIPTION_CHARS) }],
    `{
  "job_title": "title",
  "core_skills": [{ "name": "skill", "importance": "critical", "min_years": 0, "variants": [] }],
  "secondary_skills": [{ "name": "skill", "importance": "required", "min_years": 0, "variants": [] }],
  "nice_to_have_skills": [{ "name": "skill", "importance": "preferred", "min_years": 0, "variants": [] }],
  "keywords": ["keyword"],
  "experience_requirements": { "total_years": 0 }
}`
  );
}

export function buildEvidenceGradePrompt(skillName: string, minYears: number, chunkText: string): string {
  return buildStructuredPrompt(
    `Judge whether the resume excerpt below shows the candidate has the skill "${skillName}".`,
    [
      'strong: the skill was clearly used in professional work',
      'moderate: the skill was used but with limited detail',
      'weak: the skill is only listed, with no sign of use',
      'none: the excerpt does not support the skill',
      minYears > 0
        ? `The role asks for ${minYears} years; set meets_years accordingly`
        : 'No minimum years are required; meets_years is true',
      `quote is an exact excerpt of at most ${MAX_QUOTE_WORDS} words, or "" when there is none`,
      'confidence is a number between 0 and 1'
    ],
    [{ title: 'Resume excerpt', body: escapePromptText(chunkText) }],
    `{
  "has_skill": true,
  "evidence_strength": "strong|moderate|weak|none",
  "years_supported": 0,
  "meets_years": true,
  "why": "one sentence",
  "quote": "exact words from the excerpt",
  "confidence": 0.0
}`
  );
}

export function buildSkillVariantsPrompt(
  requirement: JobRequirement,
  availableSkills: readonly string[]
): string {
  const variants = requirement.nameVariants.filter(v => v !== requirement.skillName);
  const sections = [
    { title: 'Requirement', body: requirement.skillName },
    { title: 'Candidate skills', body: formatList(availableSkills.slice(0, MAX_VARIANT_CANDIDATES)) }
  ];
  if (variants.length > 0) {
    sections.splice(1, 0, { title: 'Known variants', body: formatList(variants) });
  }

  return buildStructuredPrompt(
    'Decide which of the candidate\'s skills satisfy the job requirement.',
    [
      'A generic requirement (e.g. "SQL") is satisfied by any of its versions or dialects',
      'A specific requirement (e.g. "Python 3.11") is satisfied only by that version',
      'Only return names that appear in the candidate skills list, spelled exactly as listed',
      'Return an empty array when none match'
    ],
    sections,
    '["skill name"]'
  );
}
