/**
 * Application Resolver
 *
 * Contract of the store holding registered applications, plus an in-memory
 * implementation loadable from a JSON file.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigurationError } from '@endsession/lib-core';

export interface Application {
  readonly id: string;
}

/**
 * Looks up registered applications for the logout endpoint
 */
export interface ApplicationResolver<TApplication extends Application = Application> {
  /**
   * Applications registered with exactly this post-logout redirect URI,
   * in resolver order. Consumers may stop iterating early.
   */
  findByPostLogoutRedirectUri(uri: string, signal?: AbortSignal): AsyncIterable<TApplication>;

  hasPermission(application: TApplication, permission: string, signal?: AbortSignal): Promise<boolean>;
}

export const ApplicationRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string().optional(),
  postLogoutRedirectUris: z.array(z.string().url()).default([]),
  permissions: z.array(z.string()).default([]),
});

export type ApplicationRecord = z.infer<typeof ApplicationRecordSchema>;

const ApplicationFileSchema = z.object({
  applications: z.array(ApplicationRecordSchema),
});

export class InMemoryApplicationStore implements ApplicationResolver<ApplicationRecord> {
  private readonly applications = new Map<string, ApplicationRecord>();

  constructor(records: Iterable<ApplicationRecord> = []) {
    for (const record of records) {
      this.add(record);
    }
  }

  /**
   * Add or replace an application
   */
  add(record: ApplicationRecord): void {
    this.applications.set(record.id, {
      ...record,
      postLogoutRedirectUris: [...record.postLogoutRedirectUris],
      permissions: [...record.permissions],
    });
  }

  findById(id: string): ApplicationRecord | undefined {
    return this.applications.get(id);
  }

  get size(): number {
    return this.applications.size;
  }

  async *findByPostLogoutRedirectUri(
    uri: string,
    signal?: AbortSignal
  ): AsyncGenerator<ApplicationRecord> {
    for (const application of this.applications.values()) {
      signal?.throwIfAborted();
      if (application.postLogoutRedirectUris.includes(uri)) {
        yield application;
      }
    }
  }

  async hasPermission(application: ApplicationRecord, permission: string): Promise<boolean> {
    return this.applications.get(application.id)?.permissions.includes(permission) ?? false;
  }
}

/**
 * Load application registrations from a JSON file of the form
 * `{ "applications": [{ "id": "...", "postLogoutRedirectUris": [...], "permissions": [...] }] }`
 */
export async function loadApplicationsFromFile(path: string): Promise<InMemoryApplicationStore> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read applications file '${path}': ${error instanceof Error ? error.message : String(error)}`
    );
  }
  return createApplicationStore(raw, path);
}

/**
 * Validate parsed registrations and build a store from them
 */
export function createApplicationStore(raw: unknown, source = 'input'): InMemoryApplicationStore {
  const result = ApplicationFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid applications in ${source}: ${issues}`);
  }
  return new InMemoryApplicationStore(result.data.applications);
}
