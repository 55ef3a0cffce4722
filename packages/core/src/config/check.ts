import type { Config } from '../schema/types.js';

export interface ConfigIssue {
  /** Index into config.interfaces */
  index: number;
  field: 'name' | 'ra_interval_ms';
  message: string;
}

/**
 * Pre-flight check for the rules the daemon enforces on reload.
 * ControlClient never calls this; a Config is sent as given.
 */
export function checkConfig(config: Config): ConfigIssue[] {
  const issues: ConfigIssue[] = [];
  const seen = new Map<string, number>();

  config.interfaces.forEach((iface, index) => {
    if (iface.name.length === 0) {
      issues.push({ index, field: 'name', message: 'interface name must not be empty' });
    } else {
      const first = seen.get(iface.name);
      if (first !== undefined) {
        issues.push({
          index,
          field: 'name',
          message: `duplicate interface name "${iface.name}" (first at index ${first})`,
        });
      } else {
        seen.set(iface.name, index);
      }
    }

    if (!Number.isInteger(iface.ra_interval_ms) || iface.ra_interval_ms <= 0) {
      issues.push({
        index,
        field: 'ra_interval_ms',
        message: `ra_interval_ms must be a positive integer, got ${iface.ra_interval_ms}`,
      });
    }
  });

  return issues;
}
