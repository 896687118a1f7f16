export class MalformedReviewRecordError extends Error {
  filePath: string;

  constructor(filePath: string, message: string) {
    super(`Malformed review record ${filePath}: ${message}. Fix or remove the file before preparing again.`);
    this.name = "MalformedReviewRecordError";
    this.filePath = filePath;
  }
}
