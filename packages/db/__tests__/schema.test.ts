import { describe, it, expect } from 'vitest'
import { applySchema, readSchemaSql } from '../schema.js'
import { createFakePool } from './fake-pool.js'

describe('schema', () => {
  it('declares the lookup indexes', async () => {
    const sql = await readSchemaSql()
    expect(sql).toContain('CREATE INDEX IF NOT EXISTS buses_operator_name_idx ON buses (operator_name);')
    expect(sql).toContain('CREATE INDEX IF NOT EXISTS buses_origin_destination_idx ON buses (origin, destination);')
    expect(sql).toContain('CREATE INDEX IF NOT EXISTS reviews_bus_id_idx ON reviews (bus_id);')
    expect(sql).toContain('CREATE INDEX IF NOT EXISTS reviews_sentiment_label_idx ON reviews (sentiment_label);')
  })

  it('ties reviews to buses with a foreign key', async () => {
    const sql = await readSchemaSql()
    expect(sql).toContain('bus_id            TEXT NOT NULL REFERENCES buses (bus_id)')
  })

  it('keeps per-bus sentiment shares within 0..1', async () => {
    const sql = await readSchemaSql()
    expect(sql).toContain('ALTER TABLE buses ADD COLUMN IF NOT EXISTS sentiment_positive DOUBLE PRECISION')
    expect(sql).toContain(
      'sentiment_negative  DOUBLE PRECISION CHECK (sentiment_negative IS NULL OR (sentiment_negative >= 0 AND sentiment_negative <= 1))'
    )
  })

  it('applies the whole file in one statement batch', async () => {
    const { pool, calls } = createFakePool(() => ({ rows: [], rowCount: null }))
    await applySchema(pool)
    expect(calls).toHaveLength(1)
    expect(calls[0]?.text.startsWith('-- RoutePulse harvester schema')).toBe(true)
  })
})
