import { DatabaseAdapter } from '../adapters/DatabaseAdapter.js';
import { UserProfile } from '../types/photohunt.types.js';

export class ProfilesRepository {
  constructor(private readonly db: DatabaseAdapter) {}

  async findByUserId(userId: string): Promise<UserProfile | null> {
    const result = await this.db.getKnex()('user_profiles').where('user_id', userId).first();

    return result || null;
  }

  async getTotalCompletions(userId: string): Promise<number> {
    const profile = await this.findByUserId(userId);
    return profile ? Number(profile.total_completions) : 0;
  }
}
