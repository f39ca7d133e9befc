// Imported before anything that reads the environment at load time.
process.env.LOG_LEVEL = process.env.TEST_LOG_LEVEL ?? 'silent';
process.env.REDIS_URL = '';
process.env.DATABASE_URL = '';
delete process.env.LOG_DIR;
process.env.ENGINE_SKIP_DOTENV = '1';
