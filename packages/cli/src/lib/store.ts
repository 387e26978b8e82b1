/**
 * Store adapter for CLI
 */

import { openStore, type SequenceStore } from "@seqindex/sdk";
import type { EngineSettings } from "./env.js";

/**
 * Where the store lives and how it indexes
 */
export interface CliStoreSettings extends EngineSettings {
  root: string;
}

/**
 * Open a file-backed store for one CLI invocation
 */
export function openCliStore(settings: CliStoreSettings): SequenceStore {
  return openStore({
    root: settings.root,
    k: settings.k,
    fuzzyThreshold: settings.fuzzyThreshold,
    caseSensitive: settings.caseSensitive,
  });
}

/**
 * Run `fn` against a freshly opened store and close it afterwards
 */
export async function withCliStore<T>(
  settings: CliStoreSettings,
  fn: (store: SequenceStore) => Promise<T>
): Promise<T> {
  const store = openCliStore(settings);
  try {
    return await fn(store);
  } finally {
    await store.close();
  }
}
