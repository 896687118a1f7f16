export class YamlParseError extends Error {
  filePath: string;

  constructor(filePath: string, message: string) {
    super(`YAML parse failed for ${filePath}: ${message}`);
    this.name = "YamlParseError";
    this.filePath = filePath;
  }
}

export class FileOperationError extends Error {
  operation: string;
  targetPath: string;

  constructor(operation: string, targetPath: string, cause: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to ${operation} ${targetPath}: ${message}`, { cause });
    this.name = "FileOperationError";
    this.operation = operation;
    this.targetPath = targetPath;
  }
}
