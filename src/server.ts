import os from 'os';
import path from 'path';
import { createApp } from './app';
import { HlsStream } from './core/hlsStream';
import { CleanupManager } from './utils/cleanupManager';
import { ConfigLoader } from './utils/configLoader';
import { ReportGenerator } from './utils/reportGenerator';
import logger from './utils/logger';

// Load configuration
const configLoader = ConfigLoader.getInstance();
const serverConfig = configLoader.getServerConfig();
const streamingConfig = configLoader.getStreamingConfig();
const cleanupConfig = configLoader.getCleanupConfig();
const reportsConfig = configLoader.getReportsConfig();

const streams: Map<string, HlsStream> = new Map();

const reportGenerator = new ReportGenerator(streams, logger);

const cleanupManager = new CleanupManager(streams, {
    isEnabled: cleanupConfig.enabled,
    idleTimeoutMs: cleanupConfig.idleTimeoutMinutes * 60 * 1000,
    cleanupIntervalMs: cleanupConfig.intervalMinutes * 60 * 1000,
    loggerInstance: logger,
});

const app = createApp({ streams, streamingConfig, reportGenerator, loggerInstance: logger });

let reportInterval: NodeJS.Timeout | null = null;
if (reportsConfig.enabled) {
    const reportPath = path.join(reportsConfig.path, 'buffer_history.txt');
    reportInterval = setInterval(() => {
        reportGenerator.saveReport(reportPath);
    }, reportsConfig.intervalMinutes * 60 * 1000);
}

function findServerIp(): string {
    const interfaces = os.networkInterfaces();
    for (const addresses of Object.values(interfaces)) {
        for (const iface of addresses ?? []) {
            if (iface.family === 'IPv4' && !iface.internal) {
                return iface.address;
            }
        }
    }
    return 'localhost';
}

const server = app.listen(serverConfig.port, serverConfig.host, () => {
    logger.info(`LL-HLS live buffer listening on ${serverConfig.host}:${serverConfig.port}`);
    logger.info(
        `Segments ${streamingConfig.segmentDuration}s, parts ${streamingConfig.partDuration}s, window ${streamingConfig.windowSize} segments`
    );
    logger.info(`Server is accessible from: http://${findServerIp()}:${serverConfig.port}`);
    cleanupManager.start();
});

function shutdown(signal: string): void {
    logger.info(`Received ${signal}, shutting down server...`);
    cleanupManager.stop();
    if (reportInterval) {
        clearInterval(reportInterval);
    }
    for (const stream of streams.values()) {
        stream.stop();
    }
    server.close(() => process.exit(0));
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
