#!/usr/bin/env node
import 'dotenv/config';
import { ConfigValidationError, resolveRelayEnvironment } from './config/env-validator.js';
import { createRelay } from './relay.js';
import { isAbortError } from './utils/async.js';
import { describeError, logThought } from './utils/logger.js';

// ── Startup ──────────────────────────────────────────────────────────────────

let relay: ReturnType<typeof createRelay>;
try {
    relay = createRelay(resolveRelayEnvironment());
} catch (err) {
    if (err instanceof ConfigValidationError) {
        for (const issue of err.issues) {
            console.error(`[Relay] ${issue.message} ${issue.remediation}`);
        }
    } else {
        console.error(`[Relay] Startup failed: ${describeError(err)}`);
    }
    process.exit(1);
}

const controller = new AbortController();

// ── Signal Handlers ──────────────────────────────────────────────────────────

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
        if (controller.signal.aborted) return;
        void logThought(`[Relay] Received ${signal}; shutting down.`);
        controller.abort();
    });
}

// ── Entry Point ──────────────────────────────────────────────────────────────

void logThought('[Relay] Channel relay started.');

void relay.coordinator
    .run(controller.signal)
    .catch((err: unknown) => {
        if (isAbortError(err, controller.signal)) {
            void logThought('[Relay] All loops stopped.');
            return;
        }
        console.error(`[Relay] Fatal error: ${describeError(err)}`);
        process.exitCode = 1;
    })
    .finally(() => {
        relay.repository.close();
    });
