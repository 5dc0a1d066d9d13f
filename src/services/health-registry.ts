import type { HealthStatus, HealthTransitions, HealthUpdate } from '../types/health.js';
import { MAPPING_SUBJECT_PREFIX } from '../types/health.js';
import type { ConfigRepository } from '../types/ports.js';
import { escapeHtml } from './formatting.js';
import { logThought } from '../utils/logger.js';

/**
 * Current and previous status of every monitored subject.
 *
 * Only the previous in-memory status is retained; it decides which updates
 * of a pass are announced to administrators.
 */
export class HealthRegistry {
    readonly #repository: ConfigRepository;
    readonly #previous: Map<string, HealthStatus>;

    constructor(repository: ConfigRepository) {
        this.#repository = repository;
        this.#previous = repository.loadHealthStatuses();
    }

    statusOf(key: string): HealthStatus | undefined {
        return this.#previous.get(key);
    }

    /**
     * Persist the results of a pass, drop records of mappings that no longer
     * exist and return the transitions worth announcing.
     */
    commit(updates: readonly HealthUpdate[], mappingSourceIds: Iterable<string>): HealthTransitions {
        this.#repository.pruneMappingHealth(mappingSourceIds);
        for (const update of updates) {
            this.#repository.saveHealthRecord(update.key, update.status, update.message);
        }

        const currentKeys = new Set(updates.map((update) => update.key));
        for (const key of [...this.#previous.keys()]) {
            if (key.startsWith(MAPPING_SUBJECT_PREFIX) && !currentKeys.has(key)) {
                this.#previous.delete(key);
            }
        }

        return this.diff(updates);
    }

    /** Record `updates` as the new current state and report error / recovery transitions. */
    diff(updates: readonly HealthUpdate[]): HealthTransitions {
        const errors: HealthUpdate[] = [];
        const recoveries: HealthUpdate[] = [];

        for (const update of updates) {
            const previous = this.#previous.get(update.key);
            if (previous === update.status) continue;
            this.#previous.set(update.key, update.status);

            if (update.status === 'error') {
                void logThought(`[Health] ${update.key} is failing: ${update.message ?? 'no details'}`, 'warn');
                errors.push(update);
            } else if (previous === 'error' && update.status === 'ok') {
                void logThought(`[Health] ${update.key} recovered.`);
                recoveries.push(update);
            }
        }

        return { errors, recoveries };
    }
}

export function hasTransitions(transitions: HealthTransitions): boolean {
    return transitions.errors.length > 0 || transitions.recoveries.length > 0;
}

/** Admin-facing HTML summary of one transition group. */
export function formatHealthSummary(updates: readonly HealthUpdate[], recovered: boolean): string {
    if (updates.length === 0) return '';

    if (recovered) {
        const lines = ['✅ <b>Recovered</b>', ''];
        for (const update of updates) {
            lines.push(`• ${escapeHtml(update.label)}`);
        }
        return lines.join('\n');
    }

    const lines = ['🔴 <b>Problems detected</b>', ''];
    for (const update of updates) {
        const description = escapeHtml(update.message ?? 'No reason given.');
        lines.push(`• <b>${escapeHtml(update.label)}</b>: ${description}`);
    }
    return lines.join('\n');
}
