import http from 'http';
import app from './api/v1/index';
import { PORT } from './api/v1/config/env';
import { db } from './api/v1/drizzle/db';


const server = http.createServer(app);

server.listen(PORT, () => {
    console.log(`Server is running on port ${PORT}`);
});

const shutdown = (signal: string) => {
    console.log(`🛑 ${signal} received, closing server`);
    server.close(() => {
        db.$client.end()
            .then(() => process.exit(0))
            .catch((error: unknown) => {
                console.error('❌ Failed to close database pool:', error);
                process.exit(1);
            });
    });
};

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
