export class CorpusLoadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CorpusLoadError";
  }
}
