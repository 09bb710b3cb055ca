/**
 * Schema migrations for the webhook engine, applied in order by `Migrator`.
 */

export interface Migration {
	id: string
	name: string
	up: string
	down: string
}

export const WEBHOOK_MIGRATIONS: Migration[] = [
	// ====================================================================
	// Webhooks, subscriptions, deliveries
	// ====================================================================
	{
		id: '001',
		name: 'webhooks_foundation',
		up: `-- Updated_at trigger function (reusable)
CREATE OR REPLACE FUNCTION hookline_touch_updated_at()
RETURNS TRIGGER AS $$
BEGIN
	NEW.updated_at = NOW();
	RETURN NEW;
END;
$$ LANGUAGE plpgsql;

CREATE TABLE IF NOT EXISTS webhooks (
	id TEXT PRIMARY KEY DEFAULT gen_random_uuid()::TEXT,
	name VARCHAR(255) NOT NULL,
	url TEXT NOT NULL,
	secret TEXT NOT NULL,
	is_active BOOLEAN NOT NULL DEFAULT true,
	custom_headers JSONB NOT NULL DEFAULT '{}',
	timeout_seconds INT NOT NULL DEFAULT 30 CHECK (timeout_seconds > 0),
	max_attempts INT NOT NULL DEFAULT 5 CHECK (max_attempts > 0),
	created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
	updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);

CREATE INDEX IF NOT EXISTS idx_webhooks_active ON webhooks(is_active);

DROP TRIGGER IF EXISTS touch_webhooks_updated_at ON webhooks;
CREATE TRIGGER touch_webhooks_updated_at
	BEFORE UPDATE ON webhooks
	FOR EACH ROW EXECUTE FUNCTION hookline_touch_updated_at();

CREATE TABLE IF NOT EXISTS event_subscriptions (
	id TEXT PRIMARY KEY DEFAULT gen_random_uuid()::TEXT,
	webhook_id TEXT NOT NULL REFERENCES webhooks(id) ON DELETE CASCADE,
	event_type VARCHAR(100) NOT NULL,
	is_active BOOLEAN NOT NULL DEFAULT true,
	created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
	updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
	UNIQUE (webhook_id, event_type)
);

CREATE INDEX IF NOT EXISTS idx_event_subscriptions_event ON event_subscriptions(event_type, is_active);

DROP TRIGGER IF EXISTS touch_event_subscriptions_updated_at ON event_subscriptions;
CREATE TRIGGER touch_event_subscriptions_updated_at
	BEFORE UPDATE ON event_subscriptions
	FOR EACH ROW EXECUTE FUNCTION hookline_touch_updated_at();

CREATE TABLE IF NOT EXISTS webhook_deliveries (
	id TEXT PRIMARY KEY DEFAULT gen_random_uuid()::TEXT,
	webhook_id TEXT NOT NULL REFERENCES webhooks(id) ON DELETE CASCADE,
	event_type VARCHAR(100) NOT NULL,
	event_id VARCHAR(255),
	payload JSONB NOT NULL,
	status VARCHAR(20) NOT NULL DEFAULT 'pending'
		CHECK (status IN ('pending', 'sending', 'success', 'failed', 'retrying')),
	attempt_count INT NOT NULL DEFAULT 0,
	max_attempts INT NOT NULL DEFAULT 5 CHECK (max_attempts > 0),
	status_code INT,
	response_body TEXT,
	response_headers JSONB,
	error_message TEXT,
	request_url TEXT,
	request_headers JSONB,
	duration_ms INT,
	created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
	sent_at TIMESTAMPTZ,
	next_retry_at TIMESTAMPTZ,
	completed_at TIMESTAMPTZ,
	CHECK (attempt_count >= 0 AND attempt_count <= max_attempts)
);

CREATE INDEX IF NOT EXISTS idx_webhook_deliveries_retry ON webhook_deliveries(status, next_retry_at);
CREATE INDEX IF NOT EXISTS idx_webhook_deliveries_webhook_status ON webhook_deliveries(webhook_id, status);
CREATE INDEX IF NOT EXISTS idx_webhook_deliveries_created ON webhook_deliveries(created_at);`,
		down: `DROP TABLE IF EXISTS webhook_deliveries;
DROP TABLE IF EXISTS event_subscriptions;
DROP TABLE IF EXISTS webhooks;
DROP FUNCTION IF EXISTS hookline_touch_updated_at();`,
	},

	// ====================================================================
	// Job queue for dispatch work
	// ====================================================================
	{
		id: '002',
		name: 'job_queue',
		up: `CREATE TABLE IF NOT EXISTS job_queue (
	id TEXT PRIMARY KEY,
	name VARCHAR(100) NOT NULL,
	data JSONB NOT NULL,
	status VARCHAR(20) NOT NULL DEFAULT 'pending'
		CHECK (status IN ('pending', 'running', 'completed', 'failed', 'retrying')),
	priority INT NOT NULL DEFAULT 0,
	attempts INT NOT NULL DEFAULT 0,
	max_attempts INT NOT NULL DEFAULT 4,
	run_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
	last_error TEXT,
	created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
	updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);

CREATE INDEX IF NOT EXISTS idx_job_queue_claim ON job_queue(status, run_at, priority DESC);

DROP TRIGGER IF EXISTS touch_job_queue_updated_at ON job_queue;
CREATE TRIGGER touch_job_queue_updated_at
	BEFORE UPDATE ON job_queue
	FOR EACH ROW EXECUTE FUNCTION hookline_touch_updated_at();`,
		down: `DROP TABLE IF EXISTS job_queue;`,
	},
]
