export class DetectorRunParseError extends Error {
  constructor(filePath: string, message: string) {
    super(`Detector output ${filePath} is invalid: ${message}`);
    this.name = "DetectorRunParseError";
  }
}
