/**
 * Hono environment shared by the API app, its routes and middleware
 */

import type { PageRenderer } from '../core/report-builder.js';

export type ApiEnv = {
  Variables: {
    requestId: string;
  };
};

/**
 * Collaborators and limits injected when the app is built
 */
export interface ApiDependencies {
  /** Largest accepted document, in bytes */
  maxUploadBytes: number;
  /** Optional rasterizer; overlay responses include a page image when set */
  renderer?: PageRenderer;
}
