/**
 * Attachment hydration: resolve every remote reference of a chat to a
 * local file the archiver can copy.
 *
 * References on a hydration scheme are handed to the source's asset
 * download concurrently; anything else is taken as already local. A
 * reference whose download fails, or whose resulting file is missing,
 * maps to null. One reference failing never affects another and never
 * throws out of `hydrateAll`.
 */

import { stat } from 'node:fs/promises';
import { isAbsolute } from 'node:path';
import { fileURLToPath } from 'node:url';

import pLimit from 'p-limit';
import type pino from 'pino';

import { defaultLogger } from '../logger.js';
import type { HydratedPath, Message } from '../types/index.js';
import type { SourceClient } from './sourceClient.js';

/** Schemes the source must download before the bytes exist locally. */
const HYDRATION_SCHEMES = ['mxc://', 'localmxc://'];

export function needsHydration(ref: string): boolean {
  return HYDRATION_SCHEMES.some((scheme) => ref.startsWith(scheme));
}

/** Every distinct attachment reference, in first-seen message order. */
export function attachmentRefs(messages: Iterable<Message>): string[] {
  const refs = new Set<string>();
  for (const message of messages) {
    for (const attachment of message.attachments) {
      refs.add(attachment.remoteRef);
    }
  }
  return [...refs];
}

/** Local filesystem path for a file URL or absolute path, otherwise null. */
export function localPathOf(ref: string): string | null {
  if (ref.startsWith('file://')) {
    try {
      return fileURLToPath(ref);
    } catch {
      return null;
    }
  }
  return isAbsolute(ref) ? ref : null;
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

export interface HydratorOptions {
  /** Hydrate calls in flight at once. Infinity issues them all together. */
  concurrency?: number;
  logger?: pino.Logger;
}

export class AttachmentHydrator {
  private readonly client: SourceClient;
  private readonly concurrency: number;
  private readonly log: pino.Logger;

  constructor(client: SourceClient, options: HydratorOptions = {}) {
    this.client = client;
    this.concurrency = options.concurrency ?? Infinity;
    this.log = options.logger ?? defaultLogger('hydrator');
  }

  /** Resolve one reference; failures are logged and become null. */
  async hydrate(ref: string): Promise<HydratedPath> {
    let url = ref;
    if (needsHydration(ref)) {
      try {
        const asset = await this.client.downloadAsset(ref);
        if (!asset.srcURL) {
          this.log.warn({ ref, error: asset.error ?? 'no srcURL returned' }, 'Attachment download failed');
          return null;
        }
        url = asset.srcURL;
      } catch (err) {
        this.log.warn({ ref, err }, 'Attachment download failed');
        return null;
      }
    }

    const path = localPathOf(url);
    if (!path || !(await isFile(path))) {
      this.log.warn({ ref, url }, 'Hydrated attachment is not a local file');
      return null;
    }
    return path;
  }

  /**
   * Hydrate every reference and wait for all of them. The returned map's
   * keys are exactly the input references.
   */
  async hydrateAll(refs: Iterable<string>): Promise<Map<string, HydratedPath>> {
    const limit = pLimit(this.concurrency);
    const unique = [...new Set(refs)];
    const results = await Promise.all(
      unique.map((ref) => limit(async (): Promise<[string, HydratedPath]> => [ref, await this.hydrate(ref)])),
    );
    const hydrated = new Map(results);

    const unresolved = results.filter(([, path]) => path === null).length;
    this.log.info({ references: unique.length, unresolved }, 'Attachments hydrated');
    return hydrated;
  }
}
