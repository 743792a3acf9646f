/**
 * Topic Scheme
 *
 * Builds the device's command/subscription addresses and classifies inbound
 * topics into event kinds.
 */

import type { ReportTarget, RequestTarget } from './types.js';
import { CommandCode, FIELD_COMMAND_CODES, FIELD_REPORT_NAMES } from './types.js';

// -----------------------------------------------------------------------------
// Addressing
// -----------------------------------------------------------------------------

export interface TopicScheme {
  /** Configured base, e.g. `instruments` */
  base: string;
  /** Configured device identifier */
  device: string;
}

export function commandTopic(scheme: TopicScheme, code: CommandCode): string {
  return `${scheme.base}/cmnd/${scheme.device}/${code}`;
}

/**
 * Address used both to set and to request a value. The topic is the same for
 * both; only the payload tells them apart.
 */
export function requestTopic(scheme: TopicScheme, target: RequestTarget): string {
  const code = target === 'state' ? CommandCode.STATE : FIELD_COMMAND_CODES[target];
  return commandTopic(scheme, code);
}

/**
 * The four subscriptions made on every connection acknowledgement.
 */
export function subscriptionTopics(scheme: TopicScheme): string[] {
  const { base, device } = scheme;
  return [
    `${base}/response/${device}/#`,
    `${base}/connected/${device}`,
    `${base}/error/${device}/#`,
    `${base}/status/${device}/state`,
  ];
}

// -----------------------------------------------------------------------------
// Classification
// -----------------------------------------------------------------------------

export const InboundKind = {
  DEVICE_CONNECTED: 'device-connected',
  DEVICE_ERROR: 'device-error',
  DEVICE_STATE_REPORT: 'device-state-report',
  FIELD_REPORT: 'field-report',
  IGNORED: 'ignored',
} as const;

export type InboundKind = (typeof InboundKind)[keyof typeof InboundKind];

export type InboundClassification =
  | { kind: typeof InboundKind.DEVICE_CONNECTED }
  | { kind: typeof InboundKind.DEVICE_ERROR }
  | { kind: typeof InboundKind.DEVICE_STATE_REPORT }
  | { kind: typeof InboundKind.FIELD_REPORT; target: ReportTarget; name: string }
  | { kind: typeof InboundKind.IGNORED };

/**
 * Classify an inbound topic. First match wins:
 * connected marker, error marker, bulk state report, single-field report.
 *
 * Field reports compare the whole last segment, so `max_mz` never lands on
 * the `mz` handler.
 */
export function classifyTopic(topic: string): InboundClassification {
  if (topic.includes('/connected/')) {
    return { kind: InboundKind.DEVICE_CONNECTED };
  }

  if (topic.includes('/error/')) {
    return { kind: InboundKind.DEVICE_ERROR };
  }

  const name = lastSegment(topic);

  if (name === 'state') {
    return { kind: InboundKind.DEVICE_STATE_REPORT };
  }

  const target = FIELD_REPORT_NAMES.get(name);
  if (target) {
    return { kind: InboundKind.FIELD_REPORT, target, name };
  }

  return { kind: InboundKind.IGNORED };
}

function lastSegment(topic: string): string {
  const index = topic.lastIndexOf('/');
  return index === -1 ? topic : topic.substring(index + 1);
}

// -----------------------------------------------------------------------------
// Filter Matching
// -----------------------------------------------------------------------------

/**
 * Convert an MQTT topic filter to a regular expression.
 * - `+` matches exactly one level
 * - `#` (last level only) matches the parent level and everything below it
 */
export function topicFilterToRegex(filter: string): RegExp {
  const levels = filter.split('/');
  let pattern = '';

  for (let i = 0; i < levels.length; i++) {
    const level = levels[i] ?? '';
    const separator = i === 0 ? '' : '/';

    if (level === '#' && i === levels.length - 1) {
      pattern += i === 0 ? '.*' : '(?:/.*)?';
      break;
    }

    if (level === '+') {
      pattern += `${separator}[^/]*`;
    } else {
      pattern += separator + level.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    }
  }

  return new RegExp(`^${pattern}$`);
}

/**
 * Check if a topic matches a subscription filter.
 */
export function topicMatchesFilter(topic: string, filter: string): boolean {
  return topicFilterToRegex(filter).test(topic);
}
