export class BinderError extends Error {
  constructor(message: string, public readonly fatal: boolean = true) {
    super(message);
    this.name = 'BinderError';
  }
}

export class ScanFailure extends BinderError {
  constructor(message: string, public readonly dirPath: string) {
    super(message);
    this.name = 'ScanFailure';
  }
}

export interface ItemRenderFailure {
  itemIndex: string;
  sourcePath: string;
  message: string;
}

export class RenderFailure extends BinderError {
  constructor(message: string, public readonly failures: ItemRenderFailure[] = []) {
    super(message);
    this.name = 'RenderFailure';
  }
}

/** Logged by the merger; never thrown. */
export class MergeInputMissing extends BinderError {
  constructor(message: string, public readonly inputPath: string) {
    super(message, false);
    this.name = 'MergeInputMissing';
  }
}

/** Logged by the link pass; never thrown. */
export class LinkTargetNotFound extends BinderError {
  constructor(message: string, public readonly text: string) {
    super(message, false);
    this.name = 'LinkTargetNotFound';
  }
}

export class OutputWriteFailure extends BinderError {
  constructor(message: string, public readonly outputPath: string) {
    super(message);
    this.name = 'OutputWriteFailure';
  }
}

export class PaginationDriftError extends BinderError {
  constructor(
    message: string,
    public readonly dryPageCount: number,
    public readonly committedPageCount: number
  ) {
    super(message);
    this.name = 'PaginationDriftError';
  }
}

export class AssemblyError extends BinderError {
  constructor(message: string) {
    super(message);
    this.name = 'AssemblyError';
  }
}

export class EmptyBinderError extends BinderError {
  constructor(message: string) {
    super(message);
    this.name = 'EmptyBinderError';
  }
}

export class ConfigError extends BinderError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
