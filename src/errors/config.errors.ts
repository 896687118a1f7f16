export class ConfigMissingPathError extends Error {
  constructor(configPath: string) {
    super(`Config file not found: ${configPath}`);
    this.name = "ConfigMissingPathError";
  }
}

export class ConfigInvalidFileError extends Error {
  constructor(configPath: string, message: string) {
    super(`Config file ${configPath} is invalid: ${message}`);
    this.name = "ConfigInvalidFileError";
  }
}
