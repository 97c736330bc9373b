export class CargoPprofError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CargoPprofError";
  }
}

export class ConfigError extends CargoPprofError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class EnvironmentError extends CargoPprofError {
  constructor(
    message: string,
    public readonly variable: string,
  ) {
    super(message);
    this.name = "EnvironmentError";
  }
}

export class LaunchError extends CargoPprofError {
  constructor(
    message: string,
    public readonly command: string,
  ) {
    super(message);
    this.name = "LaunchError";
  }
}

export class SubprocessError extends CargoPprofError {
  constructor(
    message: string,
    public readonly tool: string,
    public readonly exitCode: number | null,
    public readonly signal: NodeJS.Signals | null,
  ) {
    super(message);
    this.name = "SubprocessError";
  }
}

export class ProtocolError extends CargoPprofError {
  constructor(message: string) {
    super(message);
    this.name = "ProtocolError";
  }
}

export class FilesystemError extends CargoPprofError {
  constructor(
    message: string,
    public readonly path: string,
  ) {
    super(message);
    this.name = "FilesystemError";
  }
}
