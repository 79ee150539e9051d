import type { Knex } from 'knex';
import { CATEGORIES, DEFAULT_CATEGORY } from '../../types';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('products', (table) => {
    table.increments('id').primary();
    table.string('name', 100).notNullable();
    table.string('description', 250).notNullable();
    table.decimal('price', 14, 2).notNullable();
    table.boolean('available').notNullable().defaultTo(true);
    table
      .enu('category', [...CATEGORIES], { useNative: false, enumName: 'product_category' })
      .notNullable()
      .defaultTo(DEFAULT_CATEGORY);
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('products');
}
