/**
 * Herald — Weekly Post
 *
 * Publishes the weekly digest to the blog.
 *
 * Usage:
 *   npm run weekly-post                 # Publish
 *   npm run weekly-post -- --dry-run    # Preview the digest
 *
 * Cron Setup (Mondays at 9 AM):
 *   0 9 * * 1 cd /path/to/herald && npm run weekly-post >> /var/log/herald.log 2>&1
 */

import { runPublishCycle } from './publish-cycle';
import { runMain } from './shared';

runMain('Weekly post', () => runPublishCycle('weekly', process.argv.slice(2)));
