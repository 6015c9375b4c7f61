/**
 * Structured JSON output for CLI commands.
 */

import type { ErrorMetadata } from '@/ui/errors/index.js';
import { VERSION } from '@/utils/version.js';

export class OutputBuilder {
  /**
   * Build a JSON error envelope.
   *
   * @param error - Error message or Error instance
   * @param metadata - Optional suggestion and note
   */
  static buildJsonError(error: string | Error, metadata?: ErrorMetadata): Record<string, unknown> {
    return {
      version: VERSION,
      success: false,
      error: error instanceof Error ? error.message : error,
      ...metadata,
    };
  }

  /**
   * Build a JSON success envelope.
   */
  static buildJsonSuccess(data: unknown): Record<string, unknown> {
    return {
      version: VERSION,
      success: true,
      data,
    };
  }
}
