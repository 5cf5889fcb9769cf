import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('photo_validations', (table) => {
    table.uuid('id').primary();
    table.uuid('completion_id').notNullable().unique();
    table.string('reference_image_url', 500).notNullable();
    table.string('submitted_image_url', 500).notNullable();
    table.float('similarity_score').notNullable();
    table.float('confidence_score').notNullable();
    table.text('validation_prompt').notNullable();
    table.text('ai_response').notNullable();
    table.boolean('is_approved').notNullable().defaultTo(false);
    table.timestamp('created_at').notNullable().defaultTo(knex.fn.now());
    table.timestamp('updated_at').notNullable().defaultTo(knex.fn.now());

    table.foreign('completion_id').references('id').inTable('completions').onDelete('CASCADE');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('photo_validations');
}
