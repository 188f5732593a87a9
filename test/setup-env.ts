// test/setup-env.ts
// Variables fijas para e2e; la BD es sqlite en memoria (DatabaseTestModule)
process.env.JWT_SECRET = 'test-secret';
process.env.JWT_EXPIRES_IN = '1h';
process.env.ENABLE_FANTASY_SCHEDULER = 'false';
process.env.ENABLE_SWAGGER = 'false';
process.env.ALLOW_REGISTER_ADMIN = 'false';
