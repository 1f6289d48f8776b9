// ═══════════════════════════════════════════════════════════════════════════════
// SERVO CORE - Profile Store
// Named servo profiles saved as JSON documents in one directory
// ═══════════════════════════════════════════════════════════════════════════════

import * as fs from 'fs/promises';
import * as path from 'path';
import { ActuatorConfig } from '../ServoTypes';
import { Logger } from '../../../core/logging/Logger';
import { ParsedProfile, fromDocument, isRecord, toDocument } from './ProfileDocument';

export type SaveResult =
  | { success: true; name: string; path: string }
  | { success: false; name: string; error: string };

export interface LoadResult extends ParsedProfile {
  found: boolean;
}

export interface ProfileSummary {
  name: string;
  profile?: string;
  created?: string;
  totalServos: number;
}

const PROFILE_NAME = /^[A-Za-z0-9_-]{1,64}$/;

export function isValidProfileName(name: string): boolean {
  return PROFILE_NAME.test(name);
}

export class ProfileStore {
  private readonly directory: string;

  constructor(directory: string, private readonly logger: Logger) {
    this.directory = path.resolve(directory);
  }

  getDirectory(): string {
    return this.directory;
  }

  async save(name: string, configs: ActuatorConfig[], profile = 'custom'): Promise<SaveResult> {
    if (!isValidProfileName(name)) {
      return { success: false, name, error: `Invalid profile name: ${name}` };
    }

    const filePath = this.pathFor(name);
    const document = toDocument(configs, name, profile);

    try {
      await fs.mkdir(this.directory, { recursive: true });
      await fs.writeFile(filePath, `${JSON.stringify(document, null, 2)}\n`, 'utf-8');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Failed to save profile ${name}: ${message}`);
      return { success: false, name, error: message };
    }

    this.logger.info(`Saved profile ${name} (${configs.length} servos)`);
    return { success: true, name, path: filePath };
  }

  async load(name: string): Promise<LoadResult> {
    if (!isValidProfileName(name)) {
      return { found: false, configs: [], errors: [`Invalid profile name: ${name}`] };
    }

    let raw: string;
    try {
      raw = await fs.readFile(this.pathFor(name), 'utf-8');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { found: false, configs: [], errors: [`Profile not found: ${name} (${message})`] };
    }

    let doc: unknown;
    try {
      doc = JSON.parse(raw);
    } catch {
      return { found: true, configs: [], errors: [`Profile ${name} is not valid JSON`] };
    }

    const parsed = fromDocument(doc);
    if (parsed.errors.length > 0) {
      this.logger.warn(`Profile ${name} has ${parsed.errors.length} issue(s)`, { errors: parsed.errors });
    }
    return { found: true, ...parsed };
  }

  async list(): Promise<ProfileSummary[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.directory);
    } catch {
      return [];
    }

    const summaries: ProfileSummary[] = [];
    for (const entry of entries.filter(e => e.endsWith('.json')).sort()) {
      const name = entry.slice(0, -'.json'.length);
      try {
        const doc: unknown = JSON.parse(await fs.readFile(path.join(this.directory, entry), 'utf-8'));
        const metadata = isRecord(doc) && isRecord(doc.metadata) ? doc.metadata : {};
        const servos = isRecord(doc) && isRecord(doc.servos) ? doc.servos : {};
        summaries.push({
          name,
          profile: typeof metadata.profile === 'string' ? metadata.profile : undefined,
          created: typeof metadata.created === 'string' ? metadata.created : undefined,
          totalServos: Object.keys(servos).length,
        });
      } catch (error) {
        this.logger.warn(`Skipping unreadable profile ${entry}: ${error instanceof Error ? error.message : String(error)}`);
      }
    }

    return summaries;
  }

  private pathFor(name: string): string {
    return path.join(this.directory, `${name}.json`);
  }
}
