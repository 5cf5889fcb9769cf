import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('completions', (table) => {
    table.uuid('id').primary();
    table.uuid('user_id').notNullable();
    table.uuid('challenge_id').notNullable();
    table.string('submitted_image', 500).notNullable();
    table.float('validation_score').nullable();
    table.boolean('is_valid').notNullable().defaultTo(false);
    table.text('validation_notes').notNullable().defaultTo('');
    table.timestamp('created_at').notNullable().defaultTo(knex.fn.now());
    table.timestamp('updated_at').notNullable().defaultTo(knex.fn.now());

    // Foreign keys
    table.foreign('user_id').references('id').inTable('users').onDelete('CASCADE');
    table.foreign('challenge_id').references('id').inTable('challenges').onDelete('CASCADE');

    // Indexes
    table.index('challenge_id');
    table.index('created_at'); // For ordering

    // One completion per user per challenge; concurrent first submissions race here
    table.unique(['user_id', 'challenge_id']);
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('completions');
}
