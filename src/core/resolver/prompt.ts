/**
 * Prompt collaborator - the one place the pipeline waits on the user.
 */
import type { OptionDescriptor, OptionValue } from '../store/types.js';
import type { ConflictReport } from '../conflicts/types.js';
import { ValidationError, ErrorCodes } from '../../utils/errors.js';

export type PromptAnswer =
  | { kind: 'value'; value: OptionValue }
  | { kind: 'cancel' };

/**
 * How to proceed past blocking conflicts: overwrite the conflicting files,
 * keep them and skip the templates that would replace them, or stop.
 */
export type ConflictResolution = 'replace' | 'extend' | 'abort';

export const CONFLICT_RESOLUTIONS: readonly ConflictResolution[] = ['replace', 'extend', 'abort'];

export function isConflictResolution(value: string): value is ConflictResolution {
  return CONFLICT_RESOLUTIONS.some((resolution) => resolution === value);
}

export interface PromptCollaborator {
  /** Ask for one unresolved option. */
  requestValue(option: OptionDescriptor): Promise<PromptAnswer>;
  /** Ask how to handle blocking conflicts; undefined leaves them unresolved. */
  chooseResolution(report: ConflictReport): Promise<ConflictResolution | undefined>;
}

/**
 * Prompt for unattended runs: answers with option defaults and a fixed
 * conflict resolution, if one was given.
 */
export class NonInteractivePrompt implements PromptCollaborator {
  constructor(private readonly resolution?: ConflictResolution) {}

  async requestValue(option: OptionDescriptor): Promise<PromptAnswer> {
    if (option.default !== undefined) {
      return { kind: 'value', value: option.default };
    }
    throw new ValidationError(
      ErrorCodes.MISSING_OPTION_VALUE,
      `Option '${option.name}' has no default; pass --set ${option.name}=<value>`,
      { option: option.name, type: option.type, allowed: option.type === 'enum' ? option.values : undefined }
    );
  }

  async chooseResolution(): Promise<ConflictResolution | undefined> {
    return this.resolution;
  }
}
