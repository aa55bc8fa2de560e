export class InvalidSearchQuery extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidSearchQuery";
  }
}
