export const DEFAULT_MAX_CHARS = 32000;

export type AssemblerState = 'accumulating' | 'full';

export class DefinitionCeilingError extends Error {
  constructor(readonly headerLength: number, readonly maxChars: number) {
    super(`Definition header is ${headerLength} characters, which already exceeds the ${maxChars} character ceiling.`);
    this.name = 'DefinitionCeilingError';
  }
}

export function definitionHeader(username: string): string {
  return `This character is based on the Reddit user u/${username}. Here are examples of how they typically respond:\n\n`;
}

/**
 * Greedy, in-order accumulation of dialog blocks under a character ceiling.
 * Blocks are never split; the first block that does not fit closes the
 * assembler for good, even if a later, shorter block would have fit.
 */
export class DefinitionAssembler {
  private readonly parts: string[];
  private length: number;
  private current: AssemblerState = 'accumulating';
  private accepted = 0;

  constructor(header: string, readonly maxChars: number = DEFAULT_MAX_CHARS) {
    if (!Number.isInteger(maxChars) || maxChars <= 0) {
      throw new RangeError(`maxChars must be a positive integer, received ${maxChars}`);
    }
    if (header.length > maxChars) {
      throw new DefinitionCeilingError(header.length, maxChars);
    }
    this.parts = [header];
    this.length = header.length;
  }

  get state(): AssemblerState {
    return this.current;
  }

  get included(): number {
    return this.accepted;
  }

  get size(): number {
    return this.length;
  }

  tryAppend(block: string): boolean {
    if (this.current === 'full') {
      return false;
    }

    if (this.length + block.length > this.maxChars) {
      this.current = 'full';
      return false;
    }

    this.parts.push(block);
    this.length += block.length;
    this.accepted += 1;
    return true;
  }

  build(): string {
    return this.parts.join('');
  }
}

export interface AssemblyResult {
  text: string;
  included: number;
  truncated: boolean;
}

export function assembleDefinition(header: string, blocks: readonly string[], maxChars: number = DEFAULT_MAX_CHARS): AssemblyResult {
  const assembler = new DefinitionAssembler(header, maxChars);
  for (const block of blocks) {
    if (!assembler.tryAppend(block)) {
      break;
    }
  }

  return {
    text: assembler.build(),
    included: assembler.included,
    truncated: assembler.included < blocks.length,
  };
}
