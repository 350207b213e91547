import type { ExerciseCategory, ExerciseUnit, SchemaVersion } from './types';

export interface SchemaDescriptor {
  version: SchemaVersion;
  categories: readonly [ExerciseCategory, ...ExerciseCategory[]];
  palette: Readonly<Partial<Record<ExerciseCategory, string>>>;
  sqlFile: string;
}

// Each version owns one category vocabulary; both score with computeScore.
export const SCHEMA_VERSIONS: Readonly<Record<SchemaVersion, SchemaDescriptor>> = {
  '1.0.0': {
    version: '1.0.0',
    categories: ['cardio', 'muscle', 'stretch'],
    palette: { cardio: '#E57373', muscle: '#64B5F6', stretch: '#81C784' },
    sqlFile: 'schema-v1.0.0.sql'
  },
  '2.0.0': {
    version: '2.0.0',
    categories: ['physical', 'mental', 'sleepiness'],
    palette: { physical: '#FF8A65', mental: '#7986CB', sleepiness: '#9575CD' },
    sqlFile: 'schema-v2.0.0.sql'
  }
};

export const SCHEMA_VERSION_IDS = ['1.0.0', '2.0.0'] as const satisfies readonly SchemaVersion[];

export const LATEST_SCHEMA_VERSION: SchemaVersion = '2.0.0';

export const EXERCISE_UNITS = ['reps', 'sets', 'minutes', 'km', 'hours'] as const satisfies readonly ExerciseUnit[];

export const FALLBACK_COLOR = '#808080';

export function categoryColor(version: SchemaVersion, category: ExerciseCategory): string {
  return SCHEMA_VERSIONS[version].palette[category] ?? FALLBACK_COLOR;
}
