import type { Knex } from 'knex'

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('users', (table) => {
    table.increments('id').primary()
    table.string('name').notNullable()
    table.timestamp('created_at').defaultTo(knex.fn.now())
    table.timestamp('updated_at').defaultTo(knex.fn.now())
    table.index('name')
  })

  await knex.schema.createTable('spotify_integrations', (table) => {
    table.increments('id').primary()
    table
      .integer('user_id')
      .notNullable()
      .unique()
      .references('id')
      .inTable('users')
      .onDelete('CASCADE')
    table.string('spotify_user_id').notNullable()
    table.string('display_name')
    table.text('access_token').notNullable()
    table.timestamp('created_at').defaultTo(knex.fn.now())
    table.timestamp('updated_at').defaultTo(knex.fn.now())
  })

  await knex.schema.createTable('base_playlists', (table) => {
    table.increments('id').primary()
    table
      .integer('user_id')
      .notNullable()
      .references('id')
      .inTable('users')
      .onDelete('CASCADE')
    table.string('name').notNullable()
    table.string('spotify_playlist_id').notNullable()
    table.boolean('is_active').notNullable().defaultTo(true)
    table.timestamp('created_at').defaultTo(knex.fn.now())
    table.timestamp('updated_at').defaultTo(knex.fn.now())
    table.unique(['user_id', 'spotify_playlist_id'])
  })

  await knex.schema.createTable('child_playlists', (table) => {
    table.increments('id').primary()
    table
      .integer('user_id')
      .notNullable()
      .references('id')
      .inTable('users')
      .onDelete('CASCADE')
    table
      .integer('base_playlist_id')
      .notNullable()
      .references('id')
      .inTable('base_playlists')
      .onDelete('CASCADE')
    table.string('name').notNullable()
    table.text('description').notNullable().defaultTo('')
    table.string('spotify_playlist_id').notNullable()
    // JSON text, validated when read for routing
    table.text('filter_rules')
    table.boolean('is_active').notNullable().defaultTo(true)
    table.timestamp('created_at').defaultTo(knex.fn.now())
    table.timestamp('updated_at').defaultTo(knex.fn.now())
    table.index(['base_playlist_id', 'is_active'])
  })

  await knex.schema.createTable('sync_events', (table) => {
    table.increments('id').primary()
    table
      .integer('user_id')
      .notNullable()
      .references('id')
      .inTable('users')
      .onDelete('CASCADE')
    table
      .integer('base_playlist_id')
      .notNullable()
      .references('id')
      .inTable('base_playlists')
      .onDelete('CASCADE')
    table.json('child_playlist_ids').notNullable().defaultTo('[]')
    table
      .enum('status', ['in_progress', 'completed', 'failed'])
      .notNullable()
    table.timestamp('started_at').notNullable()
    table.timestamp('completed_at')
    table.integer('tracks_processed').notNullable().defaultTo(0)
    table.integer('total_api_requests').notNullable().defaultTo(0)
    table.text('error_message')
    table.string('error_kind')
    table.timestamp('created_at').defaultTo(knex.fn.now())
    table.timestamp('updated_at').defaultTo(knex.fn.now())
    table.index(['base_playlist_id', 'started_at'])
  })

  // At most one in-progress sync per base playlist
  await knex.raw(`
    CREATE UNIQUE INDEX sync_events_one_in_progress
    ON sync_events (base_playlist_id)
    WHERE status = 'in_progress'
  `)
}

export async function down(knex: Knex): Promise<void> {
  await knex.raw('DROP INDEX IF EXISTS sync_events_one_in_progress')
  await knex.schema.dropTable('sync_events')
  await knex.schema.dropTable('child_playlists')
  await knex.schema.dropTable('base_playlists')
  await knex.schema.dropTable('spotify_integrations')
  await knex.schema.dropTable('users')
}
