/**
 * Copyright (c) 2025 Rowan Cardow
 *
 * This source code is licensed under the MIT license found in the
 * LICENSE file in the root directory of this source tree.
 */

import type { GenerateReport, StylesheetPipeline } from "./pipeline.ts";

/**
 * Host-facing triggers. Development regenerates on every request,
 * every other environment once at startup.
 */
export interface RequestHook {
  onStartup(): Promise<GenerateReport | undefined>;
  onRequest(): Promise<GenerateReport | undefined>;
  /** Whether the host may page-cache generated stylesheets */
  pageCacheAllowed(): boolean;
}

export function regeneratesPerRequest(environment: string): boolean {
  return environment === "development";
}

export function createRequestHook(pipeline: StylesheetPipeline): RequestHook {
  // one pass at a time; later callers wait for the running pass
  let queue: Promise<unknown> = Promise.resolve();

  const enqueue = (): Promise<GenerateReport> => {
    const run = queue.then(
      () => pipeline.generateAll(),
      () => pipeline.generateAll(),
    );
    queue = run;
    return run;
  };

  return {
    async onStartup() {
      if (regeneratesPerRequest(pipeline.config.environment)) {
        return undefined;
      }
      return enqueue();
    },

    async onRequest() {
      if (!regeneratesPerRequest(pipeline.config.environment)) {
        return undefined;
      }
      return enqueue();
    },

    pageCacheAllowed() {
      return pipeline.pageCacheAllowed();
    },
  };
}
