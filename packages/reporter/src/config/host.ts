import { PUSH_PORTS } from "@instance-reporter/shared";

/**
 * Point a host configured for the pushgateway (port 9091) at the data push gateway (9092).
 * Only a trailing "9091" is rewritten; every other host is returned unchanged.
 */
export function normalizePushHost(host: string): string {
	if (!host.endsWith(PUSH_PORTS.PUSHGATEWAY_SUFFIX)) {
		return host;
	}
	return host.slice(0, -PUSH_PORTS.PUSHGATEWAY_SUFFIX.length) + PUSH_PORTS.DATA_PUSH_SUFFIX;
}
