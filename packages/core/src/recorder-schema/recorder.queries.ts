export const QUERIES = {
  LATEST_SCHEMA_VERSION: `
    SELECT schema_version FROM schema_changes
    ORDER BY change_id DESC
    LIMIT 1
  `,

  FIND_METADATA_ID: `
    SELECT metadata_id FROM states_meta
    WHERE entity_id = $1
    ORDER BY metadata_id
    LIMIT 1
  `,

  INSERT_METADATA: `
    INSERT INTO states_meta (entity_id) VALUES ($1)
    RETURNING metadata_id
  `,

  METADATA_EXISTS: `
    SELECT metadata_id FROM states_meta WHERE metadata_id = $1
  `,

  FIND_ATTRIBUTES_BY_HASH: `
    SELECT attributes_id, shared_attrs FROM state_attributes
    WHERE hash = $1
    ORDER BY attributes_id
  `,

  INSERT_ATTRIBUTES: `
    INSERT INTO state_attributes (hash, shared_attrs) VALUES ($1, $2)
    RETURNING attributes_id
  `,

  ATTRIBUTES_EXIST: `
    SELECT attributes_id FROM state_attributes WHERE attributes_id = $1
  `,

  COUNT_ATTRIBUTE_REFERENCES: `
    SELECT COUNT(*) AS refs FROM states WHERE attributes_id = $1
  `,

  FIND_STATE_AT: `
    SELECT state_id FROM states
    WHERE metadata_id = $1 AND last_updated_ts = $2
    ORDER BY state_id
    LIMIT 1
  `,

  INSERT_STATE: `
    INSERT INTO states (
      metadata_id, state, attributes_id,
      last_updated_ts, last_changed_ts,
      old_state_id, origin_idx
    ) VALUES (
      $1, $2, $3,
      $4, $5,
      NULL, $6
    )
    RETURNING state_id
  `,

  INSERT_STATE_WITH_LAST_REPORTED: `
    INSERT INTO states (
      metadata_id, state, attributes_id,
      last_updated_ts, last_changed_ts, last_reported_ts,
      old_state_id, origin_idx
    ) VALUES (
      $1, $2, $3,
      $4, $5, $4,
      NULL, $6
    )
    RETURNING state_id
  `,

  UPDATE_STATE: `
    UPDATE states
    SET state = $2, attributes_id = $3, last_changed_ts = $4, origin_idx = $5
    WHERE state_id = $1
  `,
} as const;
