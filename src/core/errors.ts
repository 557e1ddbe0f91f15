/**
 * Error types raised while loading artifacts.
 */

/** An artifact's text (or value) could not be read as a document. */
export class ParseError extends Error {
  readonly artifact: string;

  constructor(artifact: string, message: string) {
    super(`Failed to parse ${artifact}: ${message}`);
    this.name = 'ParseError';
    this.artifact = artifact;
  }
}

/** A required artifact does not exist. */
export class MissingArtifactError extends Error {
  readonly artifact: string;

  constructor(artifact: string, hint?: string) {
    super(`Artifact not found: ${artifact}${hint ? ` (${hint})` : ''}`);
    this.name = 'MissingArtifactError';
    this.artifact = artifact;
  }
}
