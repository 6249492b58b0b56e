export class MissingFieldError extends Error {
  constructor(
    readonly element: string,
    readonly attribute: string,
  ) {
    super(`<${element}> element is missing required attribute "${attribute}"`);
    this.name = 'MissingFieldError';
  }
}

export class MarkupParseError extends Error {
  constructor(message: string) {
    super(`Malformed quirks document: ${message}`);
    this.name = 'MarkupParseError';
  }
}
