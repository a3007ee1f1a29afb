#!/usr/bin/env tsx
/**
 * Delete refresh token records whose expiry has passed.
 *
 * Usage:
 *   npm run tokens:purge
 *   npx tsx scripts/purge-expired-tokens.ts --dry-run
 */

import { closePool, queryOne } from '../backend/src/db';
import { PgRefreshTokenStore } from '../backend/src/repositories/refresh-token.repository';
import { logger } from '../backend/src/utils/logger';

async function main() {
    const dryRun = process.argv.slice(2).includes('--dry-run');
    const now = new Date();

    if (dryRun) {
        const row = await queryOne<{ count: string }>(
            'SELECT COUNT(*)::text AS count FROM refresh_tokens WHERE expires_at < $1',
            [now]
        );
        console.log(`${row?.count ?? '0'} expired refresh tokens would be deleted`);
    } else {
        const deleted = await new PgRefreshTokenStore().deleteExpired(now);
        console.log(`Deleted ${deleted} expired refresh tokens`);
    }

    await closePool();
}

main().catch(async (err) => {
    logger.error({ err }, 'Refresh token purge failed');
    await closePool();
    process.exit(1);
});
