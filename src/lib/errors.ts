export class ContentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export type ParseIssue = { key: string; message: string };

/** Front matter in a content file is missing a key or has one of the wrong shape. */
export class PostParseError extends ContentError {
  constructor(public readonly file: string, public readonly issues: ParseIssue[]) {
    super(`Invalid front matter in ${file}: ${issues.map(i => `${i.key}: ${i.message}`).join('; ')}`);
  }
}

export class DuplicatePermalinkError extends ContentError {
  constructor(public readonly permalink: string, public readonly files: string[]) {
    super(`Permalink ${permalink} is used by ${files.join(' and ')}`);
  }
}

export class ConfigError extends Error {
  constructor(public readonly issues: ParseIssue[]) {
    super(`Invalid site configuration: ${issues.map(i => `${i.key}: ${i.message}`).join('; ')}`);
    this.name = 'ConfigError';
  }
}
