export interface RecorderSchemaProfile {
  id: string;
  minVersion: number;
  maxVersion: number;
  requiredColumns: Readonly<Record<string, readonly string[]>>;
  /** `states.last_reported_ts` exists and is written alongside `last_updated_ts`. */
  writesLastReported: boolean;
}

const BASE_COLUMNS = {
  schema_changes: ['change_id', 'schema_version'],
  states_meta: ['metadata_id', 'entity_id'],
  state_attributes: ['attributes_id', 'hash', 'shared_attrs'],
  states: [
    'state_id',
    'metadata_id',
    'state',
    'attributes_id',
    'last_updated_ts',
    'last_changed_ts',
    'old_state_id',
    'origin_idx',
  ],
} as const;

export const RECORDER_PROFILES: readonly RecorderSchemaProfile[] = [
  {
    id: 'recorder-v38',
    minVersion: 38,
    maxVersion: 42,
    requiredColumns: BASE_COLUMNS,
    writesLastReported: false,
  },
  {
    id: 'recorder-v43',
    minVersion: 43,
    maxVersion: 48,
    requiredColumns: {
      ...BASE_COLUMNS,
      states: [...BASE_COLUMNS.states, 'last_reported_ts'],
    },
    writesLastReported: true,
  },
];

export function findProfile(
  schemaVersion: number,
  profiles: readonly RecorderSchemaProfile[] = RECORDER_PROFILES,
): RecorderSchemaProfile | undefined {
  return profiles.find(
    (profile) => schemaVersion >= profile.minVersion && schemaVersion <= profile.maxVersion,
  );
}

export function supportedRange(profiles: readonly RecorderSchemaProfile[] = RECORDER_PROFILES): string {
  const min = Math.min(...profiles.map((p) => p.minVersion));
  const max = Math.max(...profiles.map((p) => p.maxVersion));
  return `${min}-${max}`;
}
