import { promises as fs } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { WizardSettings } from '../../domain/contracts';

export interface FileSettingsStoreOptions {
  filePath?: string;
  defaults?: Partial<WizardSettings>;
}

export const defaultSettings: WizardSettings = {
  loaderServiceUrl: null,
  defaultDropNaThreshold: 0,
  maxPreviewRows: 10_000,
};

export const settingsSchema = z.object({
  loaderServiceUrl: z.string().url().nullable(),
  defaultDropNaThreshold: z.number().min(0).max(1),
  maxPreviewRows: z.number().int().positive(),
});

const storedSettingsSchema = settingsSchema.partial();

export class FileSettingsStore {
  private readonly filePath: string;
  private readonly defaults: WizardSettings;

  constructor(options?: FileSettingsStoreOptions) {
    this.filePath = options?.filePath ?? path.join(process.cwd(), '.config', 'settings.json');
    this.defaults = { ...defaultSettings, ...options?.defaults };
  }

  async load(): Promise<WizardSettings> {
    try {
      const raw = await fs.readFile(this.filePath, 'utf-8');
      const parsed = storedSettingsSchema.parse(JSON.parse(raw));
      return {
        loaderServiceUrl: parsed.loaderServiceUrl !== undefined ? parsed.loaderServiceUrl : this.defaults.loaderServiceUrl,
        defaultDropNaThreshold: parsed.defaultDropNaThreshold ?? this.defaults.defaultDropNaThreshold,
        maxPreviewRows: parsed.maxPreviewRows ?? this.defaults.maxPreviewRows,
      };
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return { ...this.defaults };
      }
      throw error;
    }
  }

  async save(settings: WizardSettings): Promise<WizardSettings> {
    const validated = settingsSchema.parse(settings);
    await this.ensureDir();
    const payload = JSON.stringify(validated, null, 2);
    await fs.writeFile(this.filePath, payload, 'utf-8');
    return validated;
  }

  private async ensureDir(): Promise<void> {
    const dir = path.dirname(this.filePath);
    await fs.mkdir(dir, { recursive: true });
  }
}
