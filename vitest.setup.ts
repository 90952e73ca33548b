process.env.NODE_ENV = process.env.NODE_ENV ?? "test";
process.env.API_TOKEN = process.env.API_TOKEN ?? "test-api-token";
process.env.DEFAULT_TIMEZONE = process.env.DEFAULT_TIMEZONE ?? "Europe/Amsterdam";
process.env.DEFAULT_LANGUAGE = process.env.DEFAULT_LANGUAGE ?? "en";

// Tests run against the in-memory alarm store; no Postgres is needed.
delete process.env.DATABASE_URL;
