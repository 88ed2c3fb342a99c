import { createApp } from './app.js';
import { AttendanceSession } from './attendance/session.js';
import { loadConfig, requireKvUrl } from './config.js';
import { RedisAttendanceStore, createRedisClient } from './store/redisStore.js';

const cfg = loadConfig();

const client = createRedisClient({ url: requireKvUrl(cfg), commandTimeoutMs: cfg.kvCommandTimeoutMs });
const session = new AttendanceSession({
    store: new RedisAttendanceStore(client),
    rotationIntervalSeconds: cfg.rotationIntervalSeconds,
});

const app = createApp({ session, config: cfg });

// lazy rotation on read is always on; the timer only keeps the code fresh without readers
if (cfg.eagerRotation) session.startRotationTimer();

const server = app.listen(cfg.port, () => {
    // eslint-disable-next-line no-console
    console.log(JSON.stringify({ level: 'info', event: 'listening', port: cfg.port }));
});

function shutdown() {
    session.stopRotationTimer();
    server.close(() => {
        client.quit().catch((err: unknown) => {
            // eslint-disable-next-line no-console
            console.error(JSON.stringify({ level: 'error', event: 'store_quit_failed', message: String(err) }));
        });
    });
}

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);
