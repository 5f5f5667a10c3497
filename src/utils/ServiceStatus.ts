import logger from './logger.js';
import { getErrorMessage } from './ErrorHandler.js';

/**
 * Service Status
 */
export const SERVICE_STATUS = {
    HEALTHY: 'healthy',
    DEGRADED: 'degraded',
    UNHEALTHY: 'unhealthy'
} as const;

export type ServiceStatusType = typeof SERVICE_STATUS[keyof typeof SERVICE_STATUS];

/**
 * A service endpoint to probe
 */
export interface ServiceTarget {
    name: string;
    url: string;
    /** A failed critical probe makes the whole report unhealthy */
    critical?: boolean;
}

/**
 * Result of probing one service
 */
export interface ServiceProbeResult {
    name: string;
    url: string;
    status: Exclude<ServiceStatusType, 'degraded'>;
    httpStatus?: number;
    duration: number;
    error?: string;
}

/**
 * Overall status report
 */
export interface ServiceStatusReport {
    status: ServiceStatusType;
    timestamp: string;
    services: ServiceProbeResult[];
    summary: {
        total: number;
        healthy: number;
        unhealthy: number;
    };
}

export interface ServiceStatusOptions {
    timeoutMs?: number;
    fetchImpl?: typeof fetch;
}

/**
 * Probe a single service; any 2xx answer within the timeout is healthy
 */
async function probe(target: ServiceTarget, timeoutMs: number, fetchImpl: typeof fetch): Promise<ServiceProbeResult> {
    const startTime = Date.now();
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
        const response = await fetchImpl(target.url, { method: 'GET', signal: controller.signal });
        const duration = Date.now() - startTime;

        return {
            name: target.name,
            url: target.url,
            status: response.ok ? SERVICE_STATUS.HEALTHY : SERVICE_STATUS.UNHEALTHY,
            httpStatus: response.status,
            duration,
            error: response.ok ? undefined : `HTTP ${response.status}`
        };
    } catch (error) {
        const duration = Date.now() - startTime;
        const message = controller.signal.aborted ? `timed out after ${timeoutMs}ms` : getErrorMessage(error);

        logger.warn(`Service probe failed: ${target.name}`, { url: target.url, error: message });

        return {
            name: target.name,
            url: target.url,
            status: SERVICE_STATUS.UNHEALTHY,
            duration,
            error: message
        };
    } finally {
        clearTimeout(timeoutId);
    }
}

/**
 * Probe all services in parallel. Read-only; never throws.
 */
export async function checkServices(targets: ServiceTarget[], options: ServiceStatusOptions = {}): Promise<ServiceStatusReport> {
    const timeoutMs = options.timeoutMs ?? 5000;
    const fetchImpl = options.fetchImpl ?? fetch;

    const services = await Promise.all(targets.map(target => probe(target, timeoutMs, fetchImpl)));

    const report: ServiceStatusReport = {
        status: SERVICE_STATUS.HEALTHY,
        timestamp: new Date().toISOString(),
        services,
        summary: {
            total: services.length,
            healthy: 0,
            unhealthy: 0
        }
    };

    services.forEach((service, index) => {
        if (service.status === SERVICE_STATUS.HEALTHY) {
            report.summary.healthy++;
            return;
        }

        report.summary.unhealthy++;
        if (targets[index].critical !== false) {
            report.status = SERVICE_STATUS.UNHEALTHY;
        } else if (report.status === SERVICE_STATUS.HEALTHY) {
            report.status = SERVICE_STATUS.DEGRADED;
        }
    });

    return report;
}
