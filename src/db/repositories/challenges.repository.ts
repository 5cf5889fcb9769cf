import { DatabaseAdapter } from '../adapters/DatabaseAdapter.js';
import { Challenge } from '../types/photohunt.types.js';

export class ChallengesRepository {
  constructor(private readonly db: DatabaseAdapter) {}

  async findById(id: string): Promise<Challenge | null> {
    const result = await this.db.getKnex()('challenges').where('id', id).first();

    return result || null;
  }

  /**
   * Inactive challenges are treated as missing by the submission flow
   */
  async findActiveById(id: string): Promise<Challenge | null> {
    const result = await this.db
      .getKnex()('challenges')
      .where({ id, is_active: true })
      .first();

    return result || null;
  }
}
