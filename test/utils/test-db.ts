import { randomUUID } from 'crypto';
import { SqliteAdapter } from '../../src/db/adapters/SqliteAdapter.js';
import * as createUsers from '../../migrations/20250601000000_create_users_table.js';
import * as createChallenges from '../../migrations/20250601000100_create_challenges_table.js';
import * as createCompletions from '../../migrations/20250601000200_create_completions_table.js';
import * as createPhotoValidations from '../../migrations/20250601000300_create_photo_validations_table.js';
import * as createUserProfiles from '../../migrations/20250601000400_create_user_profiles_table.js';

const MIGRATIONS = [
  createUsers,
  createChallenges,
  createCompletions,
  createPhotoValidations,
  createUserProfiles,
];

/**
 * Fresh in-memory database with every migration applied
 */
export async function createTestDatabase(): Promise<SqliteAdapter> {
  const adapter = new SqliteAdapter(':memory:');
  await adapter.initialize();
  for (const migration of MIGRATIONS) {
    await migration.up(adapter.getKnex());
  }
  return adapter;
}

export async function seedUser(adapter: SqliteAdapter, id: string = randomUUID()): Promise<string> {
  await adapter.getKnex()('users').insert({
    id,
    email: `${id}@example.com`,
    name: 'Test User',
  });
  return id;
}

export async function seedChallenge(
  adapter: SqliteAdapter,
  options?: {
    id?: string;
    description?: string;
    referenceImage?: string | null;
    isActive?: boolean;
  }
): Promise<string> {
  const id = options?.id ?? randomUUID();
  await adapter.getKnex()('challenges').insert({
    id,
    title: 'Old Clock Tower',
    description: options?.description ?? 'The clock tower on the market square',
    latitude: 52.370216,
    longitude: 4.895168,
    reference_image:
      options?.referenceImage === undefined
        ? 'https://photo-hunt-test.s3.us-east-1.amazonaws.com/challenges/tower.jpg'
        : options.referenceImage,
    hint: 'Look up',
    is_active: options?.isActive ?? true,
  });
  return id;
}
