/** Status of a monitored subject (proxy, credential, mapping). */
export type HealthStatus = 'ok' | 'error' | 'unknown' | 'disabled';

export const HEALTH_STATUSES: readonly HealthStatus[] = ['ok', 'error', 'unknown', 'disabled'];

export const PROXY_SUBJECT = 'proxy';
export const CREDENTIAL_SUBJECT = 'credential';
export const MAPPING_SUBJECT_PREFIX = 'mapping:';

/** Single subject result produced by one health pass. */
export interface HealthUpdate {
    key: string;
    status: HealthStatus;
    message: string | null;
    label: string;
}

/** Persisted form of a {@link HealthUpdate}. */
export interface HealthRecord {
    key: string;
    status: HealthStatus;
    message: string | null;
    updatedAt: string | null;
}

/** Status changes worth telling administrators about. */
export interface HealthTransitions {
    errors: HealthUpdate[];
    recoveries: HealthUpdate[];
}

export function mappingSubject(sourceId: string): string {
    return `${MAPPING_SUBJECT_PREFIX}${sourceId}`;
}

export function isHealthStatus(value: string): value is HealthStatus {
    return HEALTH_STATUSES.some((status) => status === value);
}
