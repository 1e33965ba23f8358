/**
 * Output path resolution from a template and the local calendar
 */

import type { ClockSnapshot } from "./clock.js";

type LocalFields = Pick<ClockSnapshot, "localDate" | "localTime">;

/** Placeholder -> value, in substitution order */
const PLACEHOLDERS: ReadonlyArray<readonly [string, (s: LocalFields, identity: string) => string]> = [
  ["~me~", (_s, identity) => identity],
  ["~y~", (s) => s.localDate.slice(0, 2)],
  ["~ym~", (s) => s.localDate.slice(0, 4)],
  ["~ymd~", (s) => s.localDate],
  ["~h~", (s) => s.localTime.slice(0, 2)],
  ["~hm~", (s) => s.localTime.slice(0, 4)],
  ["~hms~", (s) => s.localTime],
];

const TIME_PLACEHOLDER = /~(y|ym|ymd|h|hm|hms)~/;

/** True when the template changes with the clock */
export function hasTimePlaceholder(template: string): boolean {
  return TIME_PLACEHOLDER.test(template);
}

/**
 * Substitute placeholders in `template`. Returns null when no template is
 * configured, meaning persistence is off.
 */
export function resolvePath(template: string, local: LocalFields, identity: string): string | null {
  if (!template) return null;
  let path = template;
  for (const [placeholder, value] of PLACEHOLDERS) {
    path = path.split(placeholder).join(value(local, identity));
  }
  return path;
}
