/**
 * Cover Letter Prompts
 */

import { fillPrompt } from '../../shared/llm/prompts';

const COVER_LETTER_PROMPT = `You are a professional career counselor writing a compelling cover letter.

JOB DESCRIPTION:
{jobDescription}

CANDIDATE'S RESUME SUMMARY:
{resumeExcerpt}

TASK: Write a professional cover letter for {companyName} that:
1. Shows genuine interest in the specific role and company
2. Highlights 2-3 most relevant experiences/achievements from the resume
3. Demonstrates clear alignment between candidate's skills and job requirements
4. Shows enthusiasm and personality while remaining professional
5. Is concise (3-4 paragraphs maximum)

STRUCTURE:
- Opening paragraph: Express interest and briefly mention most relevant qualification
- Body paragraph(s): Highlight specific experiences and achievements that align with the role
- Closing paragraph: Express enthusiasm for next steps

GUIDELINES:
- Use a confident, professional tone
- Be specific about achievements (use numbers/metrics when available)
- Avoid generic statements
- Don't repeat everything from the resume
- Keep it under 400 words
- Use "the company" if company name is unclear from job description

Return a JSON object with the following structure:
{
  "intro": "Opening paragraph text",
  "body_paragraphs": ["Body paragraph 1", "Body paragraph 2 (if needed)"],
  "closing": "Closing paragraph text",
  "company_name": "Company name extracted from job description or 'Hiring Manager'",
  "recipient_name": "Hiring Manager"
}

Do not include any explanation, just the JSON object.`;

export const COVER_LETTER_SYSTEM_PROMPT =
  'You are a professional career counselor who writes compelling, personalized cover letters. Always respond with valid JSON only.';

export function buildCoverLetterPrompt(resumeExcerpt: string, jobDescription: string, companyName: string): string {
  return fillPrompt(COVER_LETTER_PROMPT, { jobDescription, resumeExcerpt, companyName });
}
