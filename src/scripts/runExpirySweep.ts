import { SYSTEM_ACTOR_ID } from '../api/v1/config/env';
import { db } from '../api/v1/drizzle/db';
import { AlertService } from '../api/v1/service/alert.service';
import { StockLedgerService } from '../api/v1/service/stockLedger.service';
import type { ActorContext } from '../api/v1/types/actor';

// Daily job: flag expired batches, then alert on everything expiring within 90 days
const SCAN_THRESHOLD_DAYS = 90;

const systemActor: ActorContext = { userId: SYSTEM_ACTOR_ID, role: 'admin' };

void (async () => {
    try {
        console.log('🚀 Starting expiry sweep...');
        const flagged = await StockLedgerService.expireSweep(systemActor);
        const scan = await AlertService.scanExpiring(SCAN_THRESHOLD_DAYS);
        console.log(`✅ Expiry sweep done: ${flagged} flagged expired, ${scan.raised} alerts raised, ${scan.suppressed} already open`);
        process.exitCode = 0;
    } catch (error) {
        console.error('❌ Expiry sweep failed:', error);
        process.exitCode = 1;
    } finally {
        await db.$client.end();
    }
})();
