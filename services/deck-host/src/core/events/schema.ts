import { checkTopicPattern, topicMatches } from './topic.js';

export type PayloadValidator = (payload: unknown) => boolean;

/**
 * (topicPattern, schemaVersion) -> validator. First registered match wins.
 */
export class SchemaRegistry {
  private readonly entries: Array<{ segments: string[]; version: number; validate: PayloadValidator }> = [];

  register(topicPattern: string, schemaVersion: number, validate: PayloadValidator): void {
    const p = checkTopicPattern(topicPattern);
    if (!p.ok) throw new Error(`invalid schema topic pattern "${topicPattern}": ${p.reason}`);
    if (!Number.isInteger(schemaVersion) || schemaVersion <= 0) {
      throw new Error('schemaVersion must be a positive integer');
    }
    this.entries.push({ segments: p.segments, version: schemaVersion, validate });
  }

  find(topic: string, schemaVersion: number): PayloadValidator | undefined {
    return this.entries.find((e) => e.version === schemaVersion && topicMatches(e.segments, topic))?.validate;
  }
}
