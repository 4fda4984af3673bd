export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS stock_analyses (
  id BIGSERIAL PRIMARY KEY,
  analysis_id TEXT NOT NULL UNIQUE,
  symbol TEXT NOT NULL,
  stock_name TEXT NOT NULL DEFAULT '',
  period TEXT NOT NULL,
  stock_info JSONB NOT NULL DEFAULT '{}'::jsonb,
  status TEXT NOT NULL CHECK (status IN ('CREATED', 'IN_PROGRESS', 'COMPLETED', 'FAILED')),
  team_discussion TEXT,
  final_decision JSONB,
  failure_reason TEXT,
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);

CREATE TABLE IF NOT EXISTS stock_analysis_reviews (
  analysis_row_id BIGINT NOT NULL REFERENCES stock_analyses(id) ON DELETE CASCADE,
  role TEXT NOT NULL,
  agent_name TEXT NOT NULL,
  raw_output TEXT NOT NULL,
  summary TEXT NOT NULL DEFAULT '',
  focus_areas JSONB NOT NULL DEFAULT '[]'::jsonb,
  created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
  PRIMARY KEY (analysis_row_id, role)
);

CREATE INDEX IF NOT EXISTS idx_stock_analyses_symbol_created
  ON stock_analyses (symbol, created_at DESC);
`;
