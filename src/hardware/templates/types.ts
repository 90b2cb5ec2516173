/**
 * Template loading type definitions
 */

import type { Template } from '$types';

export interface TemplateLoaderConfig {
  MATCH_GRAYSCALE: boolean;
  IMAGE_EXTENSIONS: readonly string[];
}

/**
 * Outcome of scanning the ads directory
 */
export interface TemplateSet {
  templates: Template[];
  /** Image files present but not loaded (unreadable or undecodable) */
  skipped: string[];
}
