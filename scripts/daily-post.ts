/**
 * Herald — Daily Post
 *
 * Publishes newsworthy activities to the microblogs. Safe to run hourly:
 * the scheduler skips until the minimum interval has passed.
 *
 * Usage:
 *   npm run daily-post                 # Publish
 *   npm run daily-post -- --dry-run    # Preview the renderings
 *
 * Cron Setup (hourly):
 *   0 * * * * cd /path/to/herald && npm run daily-post >> /var/log/herald.log 2>&1
 *
 * Exit codes: 0 success or skipped, 2 partial failure, 1 failure.
 */

import { runPublishCycle } from './publish-cycle';
import { runMain } from './shared';

runMain('Daily post', () => runPublishCycle('daily', process.argv.slice(2)));
