export class ConfigError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

export class ProjectConfigNotFoundError extends ConfigError {
  public constructor(configPath: string, envVar: string) {
    super(`No project title configured. Create ${configPath} or set ${envVar}.`);
  }
}

export class InvalidProjectConfigError extends ConfigError {
  public constructor(source: string, message: string) {
    super(`Invalid project configuration in ${source}: ${message}.`);
  }
}
