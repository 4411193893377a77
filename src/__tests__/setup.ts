// Keeps pino quiet under test; loggers are created at module load.
process.env.STEPWISE_LOG_LEVEL = 'silent';
