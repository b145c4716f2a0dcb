import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import type { JobRecord } from '../scrapers/types';
import type { Logger } from '../utils/logger';

const optionalText = z
  .string()
  .nullish()
  .transform(value => value || undefined);

const optionalNumber = z
  .number()
  .nullish()
  .transform(value => value ?? undefined);

export const jobRecordSchema = z.object({
  title: z.string(),
  company: z
    .string()
    .nullish()
    .transform(value => value || 'Unknown'),
  location: z
    .string()
    .nullish()
    .transform(value => value ?? ''),
  description: optionalText,
  source: z.string(),
  scraped_date: z.string(),
  url: optionalText,
  estimated_salary: optionalNumber,
  estimated_fee: optionalNumber,
});

const jobFileSchema = z.array(jobRecordSchema);

export class JobFileError extends Error {
  constructor(
    readonly file: string,
    message: string
  ) {
    super(`${file}: ${message}`);
    this.name = 'JobFileError';
  }
}

const DAY_MS = 24 * 60 * 60 * 1000;

function prefixed(prefix: string, output: string): string {
  return path.join(path.dirname(output), `${prefix}${path.basename(output)}`);
}

export function failsafeName(output: string): string {
  return prefixed('failsafe_', output);
}

export function interruptedName(output: string): string {
  return prefixed('interrupted_', output);
}

export function errorName(output: string): string {
  return prefixed('error_', output);
}

function stripUndefined(record: JobRecord): JobRecord {
  const copy: JobRecord = {
    title: record.title,
    company: record.company,
    location: record.location,
    source: record.source,
    scraped_date: record.scraped_date,
  };
  if (record.description !== undefined) copy.description = record.description;
  if (record.url !== undefined) copy.url = record.url;
  if (record.estimated_salary !== undefined) copy.estimated_salary = record.estimated_salary;
  if (record.estimated_fee !== undefined) copy.estimated_fee = record.estimated_fee;
  return copy;
}

/**
 * Flat JSON storage for job lists. Relative names resolve against `dir`; writes go to a
 * temporary file that is then renamed over the target.
 */
export class JobFileStore {
  constructor(
    readonly dir: string,
    private readonly logger: Logger
  ) {}

  resolve(file: string): string {
    return path.resolve(this.dir, file);
  }

  async exists(file: string): Promise<boolean> {
    try {
      await fs.access(this.resolve(file));
      return true;
    } catch {
      return false;
    }
  }

  async load(file: string): Promise<JobRecord[]> {
    const target = this.resolve(file);
    const text = await fs.readFile(target, 'utf-8');

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new JobFileError(file, `invalid JSON (${error instanceof Error ? error.message : String(error)})`);
    }

    const result = jobFileSchema.safeParse(parsed);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new JobFileError(file, `invalid job list at ${issue.path.join('.') || '<root>'}: ${issue.message}`);
    }
    return result.data.map(stripUndefined);
  }

  async save(file: string, jobs: readonly JobRecord[]): Promise<string> {
    const target = this.resolve(file);
    const tmp = `${target}.tmp`;
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(tmp, `${JSON.stringify(jobs, null, 2)}\n`, 'utf-8');
    await fs.rename(tmp, target);
    this.logger.info(`Saved ${jobs.length} jobs to ${file}`);
    return target;
  }

  async writeText(file: string, text: string): Promise<string> {
    const target = this.resolve(file);
    await fs.writeFile(target, text, 'utf-8');
    return target;
  }

  async remove(file: string): Promise<boolean> {
    try {
      await fs.unlink(this.resolve(file));
      return true;
    } catch (error) {
      this.logger.warn(`Failed to remove ${file}`, {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  /** Deletes `interrupted_*.json` files last modified more than `maxAgeDays` ago; returns their names. */
  async cleanupInterrupted(maxAgeDays = 7, now: number = Date.now()): Promise<string[]> {
    const removed: string[] = [];
    const entries = await fs.readdir(this.dir);

    for (const name of entries) {
      if (!name.startsWith('interrupted_') || !name.endsWith('.json')) continue;
      const stat = await fs.stat(this.resolve(name));
      if (now - stat.mtimeMs > maxAgeDays * DAY_MS) {
        await fs.unlink(this.resolve(name));
        this.logger.info(`Removed old interrupted file: ${name}`);
        removed.push(name);
      }
    }

    return removed;
  }
}
