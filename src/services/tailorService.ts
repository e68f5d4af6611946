import fs from "fs";
import path from "path";
import type {
  GenerationRequest,
  TailorInput,
  TailoredContent,
  TextGenerator,
} from "../models/types";

const DEFAULT_CV_PATH = path.resolve(__dirname, "../../data/default-cv.txt");

let cachedDefaultCv: string | null = null;

export const loadDefaultCv = (filePath = DEFAULT_CV_PATH): string => {
  if (filePath === DEFAULT_CV_PATH && cachedDefaultCv !== null) {
    return cachedDefaultCv;
  }

  const text = fs.readFileSync(filePath, "utf-8").trim();
  if (filePath === DEFAULT_CV_PATH) {
    cachedDefaultCv = text;
  }
  return text;
};

const CV_SYSTEM_PROMPT =
  "You are a professional CV writer who tailors resumes to job descriptions while maintaining formatting.";

const COVER_LETTER_SYSTEM_PROMPT =
  "You are a professional cover letter writer who creates compelling, personalized cover letters.";

const describeJob = ({ title, company, description }: TailorInput) => `Job Title: ${title}
Company: ${company}

Job Description:
${description.trim() || "No description provided"}`;

export const buildCvPrompt = (input: TailorInput): GenerationRequest => ({
  systemPrompt: CV_SYSTEM_PROMPT,
  prompt: `Tailor this CV to match the job description below.

RULES:
1. Keep the exact same formatting and structure
2. Keep the same section headers
3. Only change content to highlight skills relevant to this job
4. Keep it about as long as the original
5. Keep it ATS-friendly
6. Return ONLY the tailored CV, no explanations

Original CV:
${input.cvTemplate}

${describeJob(input)}

Tailored CV:`,
});

export const buildCoverLetterPrompt = (input: TailorInput): GenerationRequest => ({
  systemPrompt: COVER_LETTER_SYSTEM_PROMPT,
  prompt: `Write a professional cover letter for this job application.

RULES:
1. Professional and compelling tone
2. Highlight relevant skills from the CV
3. Show enthusiasm for the role and company
4. Keep it to 250-300 words
5. Include a greeting and a closing
6. Return ONLY the cover letter, no explanations

CV:
${input.cvTemplate}

${describeJob(input)}

Cover Letter:`,
});

/**
 * Generates the tailored CV and the cover letter with the same key,
 * one after the other.
 */
export const generateTailoredContent = async (
  generate: TextGenerator,
  apiKey: string,
  input: TailorInput,
): Promise<TailoredContent> => {
  console.log(`[TailorService] Generating tailored CV for ${input.title} at ${input.company}`);
  const cvText = await generate(apiKey, buildCvPrompt(input));

  console.log("[TailorService] Generating cover letter");
  const coverLetterText = await generate(apiKey, buildCoverLetterPrompt(input));

  return { cvText, coverLetterText };
};
