import {
  GoogleGenerativeAI,
  GoogleGenerativeAIFetchError,
  GoogleGenerativeAIResponseError
} from '@google/generative-ai';
import { z } from 'zod';
import { AIProviderError, errorMessage } from '../utils/errors';

export interface AIEvaluationRequest {
  resumeText: string;
  jobText: string;
  model: string;
}

export interface AIEvaluation {
  score: number; // [0,1]
  rationale: string;
  strengths: string[];
  concerns: string[];
  model: string;
}

export interface AIProvider {
  readonly name: string;
  evaluate(request: AIEvaluationRequest, signal: AbortSignal): Promise<AIEvaluation>;
}

/**
 * The slice of the Gemini model the provider calls. GenerativeModel satisfies it.
 */
export interface JudgeModel {
  generateContent(prompt: string, options: { signal: AbortSignal }): Promise<{ response: { text(): string } }>;
}

export type JudgeModelFactory = (model: string) => JudgeModel;

const MAX_RESUME_CHARS = 3000;
const MAX_JOB_CHARS = 2000;
const TEMPERATURE = 0.3;

const judgmentSchema = z.object({
  score: z.coerce.number().min(0).max(100),
  explanation: z.string().default(''),
  strengths: z.array(z.string()).default([]),
  concerns: z.array(z.string()).default([])
});

export class GeminiAIProvider implements AIProvider {
  readonly name = 'gemini';
  private readonly modelFactory: JudgeModelFactory;
  private readonly models = new Map<string, JudgeModel>();

  constructor(apiKey?: string, modelFactory?: JudgeModelFactory) {
    if (modelFactory) {
      this.modelFactory = modelFactory;
    } else {
      if (!apiKey) {
        throw new Error('GEMINI_API_KEY is required for AI matching');
      }
      const genAI = new GoogleGenerativeAI(apiKey);
      this.modelFactory = (model: string) =>
        genAI.getGenerativeModel({
          model,
          generationConfig: { temperature: TEMPERATURE, responseMimeType: 'application/json' }
        });
    }
  }

  async evaluate(request: AIEvaluationRequest, signal: AbortSignal): Promise<AIEvaluation> {
    const prompt = this.buildPrompt(request.resumeText, request.jobText);

    let text: string;
    try {
      const result = await this.model(request.model).generateContent(prompt, { signal });
      text = result.response.text();
    } catch (error) {
      throw classifyError(error);
    }

    return this.parseJudgment(text, request.model);
  }

  buildPrompt(resumeText: string, jobText: string): string {
    return `You are an expert HR recruiter. Evaluate how well the candidate's resume matches the job description.

Return strict JSON:
{
  "score": 0-100,
  "explanation": "two or three sentences on the overall fit",
  "strengths": ["specific strength", "..."],
  "concerns": ["specific gap or concern", "..."]
}

Guidelines:
- score: 90-100 exceptional fit, 70-89 strong, 50-69 partial, below 50 weak.
- Judge skills, experience level and domain relevance against the stated requirements.
- List at most five strengths and five concerns.

Job Description:
---
${jobText.substring(0, MAX_JOB_CHARS)}

Resume:
---
${resumeText.substring(0, MAX_RESUME_CHARS)}`;
  }

  parseJudgment(text: string, model: string): AIEvaluation {
    let jsonText = text.trim();
    if (jsonText.startsWith('```json')) {
      jsonText = jsonText.replace(/```json\n?/g, '').replace(/```\n?/g, '').trim();
    } else if (jsonText.startsWith('```')) {
      jsonText = jsonText.replace(/```\n?/g, '').trim();
    }

    let raw: unknown;
    try {
      raw = JSON.parse(jsonText);
    } catch (error) {
      throw new AIProviderError('malformed', `AI response is not valid JSON: ${errorMessage(error)}`);
    }

    const parsed = judgmentSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
      throw new AIProviderError('malformed', `AI response failed validation: ${issues}`);
    }

    return {
      score: parsed.data.score / 100,
      rationale: parsed.data.explanation.trim(),
      strengths: parsed.data.strengths.slice(0, 5),
      concerns: parsed.data.concerns.slice(0, 5),
      model
    };
  }

  private model(name: string): JudgeModel {
    let instance = this.models.get(name);
    if (!instance) {
      instance = this.modelFactory(name);
      this.models.set(name, instance);
    }
    return instance;
  }
}

function classifyError(error: unknown): AIProviderError {
  if (error instanceof AIProviderError) return error;
  const message = errorMessage(error);

  if (error instanceof GoogleGenerativeAIFetchError) {
    const status = error.status ?? 0;
    if (status === 429) return new AIProviderError('rate_limit', message);
    if (status >= 500) return new AIProviderError('server', message);
    if (status >= 400) return new AIProviderError('rejected', message);
  }
  if (error instanceof GoogleGenerativeAIResponseError) {
    return new AIProviderError('rejected', message);
  }
  if (error instanceof Error && error.name === 'AbortError') {
    return new AIProviderError('timeout', message);
  }
  return new AIProviderError('network', message);
}
