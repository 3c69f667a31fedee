/**
 * Scanner Errors
 */

import { LoxError, renderErrorMessage } from '../types.js';

export class ScanError extends LoxError {
  constructor(
    errorId: string,
    line: number,
    context: Record<string, unknown> = {}
  ) {
    // Unknown or non-scan IDs throw TypeError
    super({
      errorId,
      message: renderErrorMessage(errorId, 'scan', context),
      line,
      context,
    });

    this.name = 'ScanError';
  }
}
