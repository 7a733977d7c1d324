/**
 * Topic syntax helpers
 *
 * Topics are `/`-separated levels. Patterns may use `+` for exactly one level
 * and a trailing `#` for any number of levels, including none.
 */

import { InvalidTopicError } from '@brokerline/types';

export const TOPIC_SEPARATOR = '/';
export const SINGLE_LEVEL_WILDCARD = '+';
export const MULTI_LEVEL_WILDCARD = '#';

/**
 * Check a concrete topic (no wildcards) and throw if it is malformed
 */
export function validateTopic(topic: string): void {
  if (topic.length === 0) {
    throw new InvalidTopicError('Topic must not be empty');
  }
  if (topic.includes('\u0000')) {
    throw new InvalidTopicError(`Topic must not contain NUL characters: ${JSON.stringify(topic)}`);
  }
  if (topic.includes(SINGLE_LEVEL_WILDCARD) || topic.includes(MULTI_LEVEL_WILDCARD)) {
    throw new InvalidTopicError(`Topic must not contain wildcards: ${topic}`, {
      details: { topic },
    });
  }
}

/**
 * Check a subscription pattern and throw if it is malformed
 */
export function validatePattern(pattern: string): void {
  if (pattern.length === 0) {
    throw new InvalidTopicError('Topic pattern must not be empty');
  }
  if (pattern.includes('\u0000')) {
    throw new InvalidTopicError(
      `Topic pattern must not contain NUL characters: ${JSON.stringify(pattern)}`
    );
  }

  const levels = pattern.split(TOPIC_SEPARATOR);
  levels.forEach((level, index) => {
    if (level.includes(MULTI_LEVEL_WILDCARD)) {
      if (level !== MULTI_LEVEL_WILDCARD || index !== levels.length - 1) {
        throw new InvalidTopicError(
          `'#' must occupy a whole level at the end of the pattern: ${pattern}`,
          { details: { pattern } }
        );
      }
    }
    if (level.includes(SINGLE_LEVEL_WILDCARD) && level !== SINGLE_LEVEL_WILDCARD) {
      throw new InvalidTopicError(`'+' must occupy a whole level: ${pattern}`, {
        details: { pattern },
      });
    }
  });
}

/**
 * Check whether a pattern contains wildcard levels
 */
export function isWildcardPattern(pattern: string): boolean {
  return pattern
    .split(TOPIC_SEPARATOR)
    .some((level) => level === SINGLE_LEVEL_WILDCARD || level === MULTI_LEVEL_WILDCARD);
}

/**
 * Match a concrete topic against a pattern
 *
 * `a/#` also matches `a`. Wildcards in the first level never match topics
 * starting with `$` (broker-reserved namespaces).
 */
export function matchTopic(pattern: string, topic: string): boolean {
  const patternLevels = pattern.split(TOPIC_SEPARATOR);
  const topicLevels = topic.split(TOPIC_SEPARATOR);

  const first = patternLevels[0];
  if (
    topic.startsWith('$') &&
    (first === SINGLE_LEVEL_WILDCARD || first === MULTI_LEVEL_WILDCARD)
  ) {
    return false;
  }

  for (let i = 0; i < patternLevels.length; i++) {
    const level = patternLevels[i];
    if (level === MULTI_LEVEL_WILDCARD) {
      return true;
    }
    if (i >= topicLevels.length) {
      return false;
    }
    if (level !== SINGLE_LEVEL_WILDCARD && level !== topicLevels[i]) {
      return false;
    }
  }

  return patternLevels.length === topicLevels.length;
}

/**
 * Translate a topic or pattern into a NATS subject
 */
export function toNatsSubject(topic: string): string {
  return topic
    .split(TOPIC_SEPARATOR)
    .map((level) => {
      if (level === SINGLE_LEVEL_WILDCARD) return '*';
      if (level === MULTI_LEVEL_WILDCARD) return '>';
      if (level.length === 0 || /[.*>\s]/.test(level)) {
        throw new InvalidTopicError(`Topic level "${level}" cannot be expressed as a NATS token`, {
          details: { topic },
        });
      }
      return level;
    })
    .join('.');
}

/**
 * Translate a NATS subject back into a topic or pattern
 */
export function fromNatsSubject(subject: string): string {
  return subject
    .split('.')
    .map((token) => {
      if (token === '*') return SINGLE_LEVEL_WILDCARD;
      if (token === '>') return MULTI_LEVEL_WILDCARD;
      return token;
    })
    .join(TOPIC_SEPARATOR);
}
