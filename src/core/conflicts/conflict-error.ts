import { AppForgeError, ErrorCodes } from '../../utils/errors.js';
import { blockingEntries, type ConflictReport } from './types.js';

/**
 * Blocking conflicts need an explicit replace/extend/abort decision.
 */
export class ConflictError extends AppForgeError {
  constructor(public readonly report: ConflictReport) {
    const blocking = blockingEntries(report);
    super(
      ErrorCodes.BLOCKING_CONFLICT,
      `Generator '${report.generatorId}' conflicts with ${blocking.length} existing item${blocking.length === 1 ? '' : 's'}: ` +
        blocking.map((entry) => entry.matchedSymbol ? `${entry.matchedSymbol} (${entry.matchedPath})` : entry.matchedPath).join(', '),
      {
        generatorId: report.generatorId,
        blocking: blocking.map((entry) => ({
          path: entry.matchedPath,
          symbol: entry.matchedSymbol,
          pattern: entry.pattern,
          reason: entry.reason,
        })),
      }
    );
    this.name = 'ConflictError';
  }
}
