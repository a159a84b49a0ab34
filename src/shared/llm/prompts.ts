/**
 * LLM Prompts
 *
 * Prompt builders for job-posting parsing and tailored document generation.
 */

/**
 * Build a structured prompt with clear instructions
 */
function buildStructuredPrompt(
  task: string,
  instructions: string[],
  outputFormat?: string
): string {
  let prompt = `${task}\n\n`;

  if (instructions.length > 0) {
    prompt += 'INSTRUCTIONS:\n';
    instructions.forEach((instruction, i) => {
      prompt += `${i + 1}. ${instruction}\n`;
    });
    prompt += '\n';
  }

  if (outputFormat) {
    prompt += `OUTPUT FORMAT:\n${outputFormat}\n\n`;
  }

  return prompt;
}

/**
 * Normalize line endings and trim text before inclusion in prompts
 */
function escapePromptText(text: string): string {
  return text
    .replace(/\r\n/g, '\n')
    .replace(/\r/g, '\n')
    .trim();
}

/**
 * Truncate text to a maximum length while preserving word boundaries
 */
function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }

  const truncated = text.substring(0, maxLength);
  const lastSpace = truncated.lastIndexOf(' ');

  if (lastSpace > 0) {
    return truncated.substring(0, lastSpace) + '...';
  }

  return truncated + '...';
}

/**
 * Format a list of items for inclusion in a prompt
 */
function formatList(items: readonly string[]): string {
  return items.map(item => `- ${item}`).join('\n');
}

// ============================================================================
// Job Parsing
// ============================================================================

export const JOB_PARSING_SYSTEM_PROMPT =
  'You extract structured hiring requirements from job postings. Respond with JSON only.';

export interface JobParsingPromptInput {
  jobDescription: string;
  companyName?: string;
  roleTitle?: string;
}

const JOB_PARSING_FORMAT = `{
  "roleTitle": "The job title/position",
  "seniorityLevel": "junior, mid, senior, lead, principal, etc.",
  "mustHaveSkills": ["required skills and technologies"],
  "niceToHaveSkills": ["preferred skills"],
  "keyResponsibilities": ["top 5 main responsibilities"],
  "companyValues": ["keywords related to company culture/values"],
  "confidenceScore": 0.95
}`;

/** Postings longer than this are truncated before parsing */
const MAX_JOB_DESCRIPTION_CHARS = 12000;

export function buildJobParsingPrompt(input: JobParsingPromptInput): string {
  const header = [
    `Company: ${input.companyName || 'Not specified'}`,
    `Role: ${input.roleTitle || 'Not specified'}`,
    'Job Description:',
    truncateText(escapePromptText(input.jobDescription), MAX_JOB_DESCRIPTION_CHARS)
  ].join('\n');

  return buildStructuredPrompt(
    `Parse this job description and extract structured information.\n\n${header}`,
    [
      'List each skill or technology once, using the wording of the posting.',
      'Put a skill under mustHaveSkills only when the posting states it as required.',
      'Use an empty array when a section has no content.',
      'Set confidenceScore between 0 and 1 to reflect how clearly the posting states its requirements.'
    ],
    `Return only valid JSON, no additional text:\n${JOB_PARSING_FORMAT}`
  );
}

// ============================================================================
// Document Generation
// ============================================================================

export const GENERATION_SYSTEM_PROMPT =
  'You write tailored, factual CV content grounded only in the evidence provided. Respond with JSON only.';

export interface PromptArtifact {
  id: string;
  title: string;
  content: string;
  skills: readonly string[];
}

export interface GenerationPromptInput {
  documentType: 'cv' | 'cover_letter';
  roleTitle?: string;
  companyName?: string;
  mustHaveSkills: readonly string[];
  niceToHaveSkills: readonly string[];
  keyResponsibilities: readonly string[];
  artifacts: readonly PromptArtifact[];
  preferences: {
    tone?: string;
    length?: string;
  };
}

const GENERATION_FORMAT = `{
  "professionalSummary": "2-4 sentence summary",
  "keySkills": ["skills backed by the evidence"],
  "experience": [{ "title": "", "organization": "", "period": "", "highlights": [""] }],
  "projects": [{ "name": "", "description": "", "technologies": [""] }],
  "education": [{ "institution": "", "qualification": "", "period": "" }],
  "certifications": [""]
}`;

/** Per-artifact content budget inside the generation prompt */
const MAX_ARTIFACT_CHARS = 2000;

export function buildGenerationPrompt(input: GenerationPromptInput): string {
  const documentLabel = input.documentType === 'cover_letter' ? 'cover letter' : 'CV';

  const artifacts = input.artifacts.map((artifact, i) => [
    `[${i + 1}] ${artifact.title} (id: ${artifact.id})`,
    `Skills: ${artifact.skills.join(', ') || 'none listed'}`,
    truncateText(escapePromptText(artifact.content), MAX_ARTIFACT_CHARS)
  ].join('\n')).join('\n\n');

  const requirements = [
    `Role: ${input.roleTitle || 'Not specified'}`,
    `Company: ${input.companyName || 'Not specified'}`,
    'Must-have skills:',
    formatList(input.mustHaveSkills) || '- none listed',
    'Nice-to-have skills:',
    formatList(input.niceToHaveSkills) || '- none listed',
    'Key responsibilities:',
    formatList(input.keyResponsibilities) || '- none listed'
  ].join('\n');

  return buildStructuredPrompt(
    `Generate the content of a tailored ${documentLabel} for this role.\n\n` +
    `JOB REQUIREMENTS:\n${requirements}\n\n` +
    `EVIDENCE (most relevant first):\n${artifacts}`,
    [
      'Ground every statement in the evidence above. Do not invent employers, dates or achievements.',
      'Lead with the evidence that best covers the must-have skills.',
      `Tone: ${input.preferences.tone || 'professional'}. Length: ${input.preferences.length || 'standard'}.`,
      'Use empty arrays for sections the evidence does not support.'
    ],
    `Return a JSON object with exactly these keys:\n${GENERATION_FORMAT}`
  );
}
