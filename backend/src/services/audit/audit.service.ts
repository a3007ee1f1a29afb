import { execute } from '../../db';
import { createChildLogger } from '../../utils/logger';

const log = createChildLogger({ module: 'audit' });

export type AuditAction =
    | 'login_success'
    | 'login_failure'
    | 'logout'
    | 'logout_all'
    | 'refresh_reuse_detected';

export interface AuditEvent {
    action: AuditAction;
    userId: string | null;
    username?: string;
    ipAddress?: string;
    userAgent?: string;
    details?: Record<string, unknown>;
}

/**
 * Fire-and-forget audit destination. `record` returns immediately; a sink
 * reports its own failures and never throws them back at the caller.
 */
export interface AuditSink {
    record(event: AuditEvent): void;
}

/**
 * Writes audit events to the `audit_logs` table without holding up the request.
 */
export class PgAuditSink implements AuditSink {
    record(event: AuditEvent): void {
        void this.write(event).catch((err: unknown) => {
            log.error({ err, action: event.action, userId: event.userId }, 'Failed to write audit log');
        });
    }

    private async write(event: AuditEvent): Promise<void> {
        const details = { ...event.details, ...(event.username ? { username: event.username } : {}) };
        await execute(
            `INSERT INTO audit_logs (user_id, action, resource, ip_address, user_agent, details)
             VALUES ($1, $2, 'auth', $3, $4, $5)`,
            [
                event.userId,
                event.action,
                event.ipAddress ?? null,
                event.userAgent ?? null,
                Object.keys(details).length > 0 ? JSON.stringify(details) : null,
            ]
        );
        log.debug({ action: event.action, userId: event.userId }, 'Audit log created');
    }
}

/** Keeps events in memory; used by tests and by local runs without a database. */
export class MemoryAuditSink implements AuditSink {
    readonly events: AuditEvent[] = [];

    record(event: AuditEvent): void {
        this.events.push(event);
    }

    actions(): AuditAction[] {
        return this.events.map((e) => e.action);
    }
}
