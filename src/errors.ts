export class RevisionResolutionError extends Error {
  ref: string;

  constructor(message: string, ref: string) {
    super(message);
    this.name = 'RevisionResolutionError';
    this.ref = ref;
  }
}

export class CommandFailedError extends Error {
  line: string;
  exitCode: number;

  constructor(message: string, line: string, exitCode: number) {
    super(message);
    this.name = 'CommandFailedError';
    this.line = line;
    this.exitCode = exitCode;
  }
}

export class ConfigError extends Error {
  issues: string[];

  constructor(message: string, issues: string[]) {
    super(message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
