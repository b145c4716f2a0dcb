import OpenAI from 'openai';
import type { JobRecord } from '../scrapers/types';
import type { Logger } from '../utils/logger';

const MODEL = 'gpt-4o-mini';
export const FEE_RATE = 0.25;

export interface SalaryEstimate {
  salary: number;
  currency: 'EUR';
}

/** Sends one prompt and resolves to the reply text, or null when there is none. */
export type CompleteFn = (prompt: string) => Promise<string | null>;

export function openAICompletion(client: OpenAI): CompleteFn {
  return async prompt => {
    const response = await client.chat.completions.create({
      model: MODEL,
      messages: [{ role: 'user', content: prompt }],
      temperature: 0.1,
      max_tokens: 10,
    });
    return response.choices[0]?.message?.content ?? null;
  };
}

export function salaryPrompt(title: string, company: string, location: string): string {
  return `Je suis en France. Estime le salaire annuel en euros pour un poste de '${title}' chez '${company}' à ${location}, France. Donne seulement le montant numérique sans texte. Par exemple: 45000`;
}

/** Keeps the digits and dots of the reply; 0 when nothing numeric is left. */
export function parseSalary(reply: string): number {
  const digits = [...reply.trim()].filter(char => (char >= '0' && char <= '9') || char === '.').join('');
  if (!digits) return 0;
  const value = Number(digits);
  return Number.isFinite(value) ? value : 0;
}

export class SalaryEstimator {
  constructor(
    private readonly complete: CompleteFn | null,
    private readonly location: string,
    private readonly logger: Logger
  ) {}

  get available(): boolean {
    return this.complete !== null;
  }

  async estimate(title: string, company: string): Promise<SalaryEstimate> {
    if (!this.complete) return { salary: 0, currency: 'EUR' };

    try {
      const reply = await this.complete(salaryPrompt(title, company, this.location));
      this.logger.debug('Salary response content', { reply });
      const salary = reply ? parseSalary(reply) : 0;
      if (salary === 0) this.logger.warn(`No valid salary in response for '${title}'`, { reply });
      return { salary, currency: 'EUR' };
    } catch (error) {
      this.logger.error(`Error evaluating salary for '${title}'`, error);
      return { salary: 0, currency: 'EUR' };
    }
  }

  /** Estimates every record without an estimate yet, one request at a time. */
  async estimateAll(jobs: readonly JobRecord[]): Promise<{ jobs: JobRecord[]; estimated: number }> {
    const result: JobRecord[] = [];
    let estimated = 0;

    for (const job of jobs) {
      if (job.estimated_salary !== undefined) {
        result.push(job);
        continue;
      }
      const { salary } = await this.estimate(job.title, job.company);
      result.push({ ...job, estimated_salary: salary, estimated_fee: salary * FEE_RATE });
      estimated++;
    }

    this.logger.info(`Estimated salaries for ${estimated} jobs`);
    return { jobs: result, estimated };
  }
}

export function createSalaryEstimator(apiKey: string | undefined, location: string, logger: Logger): SalaryEstimator {
  if (!apiKey) {
    logger.warn('OPENAI_API_KEY not set, salary estimates will be 0');
    return new SalaryEstimator(null, location, logger);
  }
  return new SalaryEstimator(openAICompletion(new OpenAI({ apiKey })), location, logger);
}
