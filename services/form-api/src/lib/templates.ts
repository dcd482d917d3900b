/**
 * File Template Store
 *
 * Form templates are JSON files in one directory, one file per template.
 * Template names are file names; ".json" is appended when missing.
 */

import { promises as fs } from 'fs';
import path from 'path';
import {
  ConflictError,
  NotFoundError,
  ValidationError,
  errorMessage,
  logger,
  parseFieldTemplate,
  type FieldTemplate,
  type TemplateSummary,
} from '@tradeform/shared';

const TEMPLATE_NAME_PATTERN = /^[A-Za-z0-9_-]+(\.json)?$/;

/**
 * "commercial_invoice" -> "commercial_invoice.json". Anything that is not a
 * plain file name (path separators, dots, spaces) is rejected.
 */
export function normalizeTemplateName(name: string): string {
  const trimmed = name.trim();
  if (!TEMPLATE_NAME_PATTERN.test(trimmed)) {
    throw new ValidationError(`invalid template name: ${name}`, [
      'template names may contain letters, digits, "_" and "-", with an optional .json suffix',
    ]);
  }
  return trimmed.endsWith('.json') ? trimmed : `${trimmed}.json`;
}

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

export class FileTemplateStore {
  constructor(private readonly dir: string) {}

  /**
   * All templates with their field names, sorted by name. Files that are not
   * valid templates are skipped.
   */
  async list(): Promise<TemplateSummary[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.dir);
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        logger.warn('Template directory not found', { dir: this.dir });
        return [];
      }
      throw error;
    }

    const summaries: TemplateSummary[] = [];
    const files = entries.filter((entry) => entry.endsWith('.json') && TEMPLATE_NAME_PATTERN.test(entry)).sort();
    for (const file of files) {
      try {
        const template = await this.read(file);
        summaries.push({ name: file, fields: Object.keys(template) });
      } catch (error) {
        logger.warn('Skipping unreadable template', {
          template: file,
          error: errorMessage(error),
        });
      }
    }
    return summaries;
  }

  async get(name: string): Promise<FieldTemplate> {
    const file = normalizeTemplateName(name);
    try {
      return await this.read(file);
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        throw new NotFoundError(`template ${file} not found`);
      }
      throw error;
    }
  }

  /**
   * Write a new template file. Returns the stored name.
   */
  async create(name: string, template: FieldTemplate): Promise<string> {
    const file = normalizeTemplateName(name);
    const validated = parseFieldTemplate(template);

    await fs.mkdir(this.dir, { recursive: true });
    try {
      await fs.writeFile(path.join(this.dir, file), `${JSON.stringify(validated, null, 2)}\n`, {
        encoding: 'utf-8',
        flag: 'wx',
      });
    } catch (error) {
      if (hasErrorCode(error, 'EEXIST')) {
        throw new ConflictError(`template ${file} already exists`);
      }
      throw error;
    }

    logger.info('Template created', { template: file, field_count: Object.keys(validated).length });
    return file;
  }

  private async read(file: string): Promise<FieldTemplate> {
    const raw = await fs.readFile(path.join(this.dir, file), 'utf-8');
    return parseFieldTemplate(JSON.parse(raw));
  }
}
