/**
 * Topic names and subscription patterns.
 *
 * Topics are dot-separated lowercase segments of [a-z0-9-].
 * Patterns may also use '*' (exactly one segment) and '**' (zero or more).
 */

const SEGMENT_RE = /^[a-z0-9-]+$/;

export type TopicCheck =
  | { ok: true; segments: string[] }
  | { ok: false; reason: string };

function split(value: string, allowWildcards: boolean): TopicCheck {
  if (value.length === 0) return { ok: false, reason: 'empty' };
  const segments = value.split('.');
  for (const seg of segments) {
    if (seg.length === 0) return { ok: false, reason: 'empty_segment' };
    if (allowWildcards && (seg === '*' || seg === '**')) continue;
    if (!SEGMENT_RE.test(seg)) return { ok: false, reason: `invalid_segment:${seg}` };
  }
  return { ok: true, segments };
}

export function checkTopicName(topic: string): TopicCheck {
  return split(topic, false);
}

export function checkTopicPattern(pattern: string): TopicCheck {
  return split(pattern, true);
}

/** Match compiled pattern segments against concrete topic segments. */
export function matchTopic(pattern: readonly string[], topic: readonly string[]): boolean {
  // reachable[j]: pattern prefix consumed so far can end at topic index j
  let reachable = new Array<boolean>(topic.length + 1).fill(false);
  reachable[0] = true;

  for (const seg of pattern) {
    const next = new Array<boolean>(topic.length + 1).fill(false);
    for (let j = 0; j <= topic.length; j++) {
      if (!reachable[j]) continue;
      if (seg === '**') {
        for (let k = j; k <= topic.length; k++) next[k] = true;
        break;
      }
      if (j < topic.length && (seg === '*' || seg === topic[j])) next[j + 1] = true;
    }
    reachable = next;
  }

  return reachable[topic.length] === true;
}

export function topicMatches(pattern: readonly string[], topic: string): boolean {
  const t = checkTopicName(topic);
  return t.ok && matchTopic(pattern, t.segments);
}
