import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('challenges', (table) => {
    table.uuid('id').primary();
    table.string('title', 255).notNullable();
    table.text('description').notNullable();
    table.decimal('latitude', 20, 15).notNullable();
    table.decimal('longitude', 20, 15).notNullable();
    table.string('reference_image', 500).nullable();
    table.text('hint').nullable();
    table.boolean('is_active').notNullable().defaultTo(true);
    table.timestamp('created_at').notNullable().defaultTo(knex.fn.now());
    table.timestamp('updated_at').notNullable().defaultTo(knex.fn.now());

    table.index('is_active');
    table.index('created_at');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('challenges');
}
