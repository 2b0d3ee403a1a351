// src/mqtt/topics.ts

/**
 * MQTT filter matching with `+` (one level) and `#` (all remaining levels).
 */
export function topicMatches(filter: string, topic: string): boolean {
  const filterLevels = filter.split('/');
  const topicLevels = topic.split('/');

  for (let i = 0; i < filterLevels.length; i++) {
    const level = filterLevels[i];
    if (level === '#') return true;
    if (i >= topicLevels.length) return false;
    if (level !== '+' && level !== topicLevels[i]) return false;
  }
  return filterLevels.length === topicLevels.length;
}

export function joinTopic(...levels: string[]): string {
  return levels.filter(level => level !== '').join('/');
}

/** Topic prefix used when the broker URI has no path */
export function defaultPrefix(serial: string): string {
  return `nbe/${serial}`;
}
