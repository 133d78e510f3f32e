import knex, { Knex } from "knex";

export function createDb(filename: string, acquireTimeoutMs = 10000): Knex {
  return knex({
    client: "sqlite3",
    connection: { filename },
    useNullAsDefault: true,
    // one connection: SQLite serialises writers anyway, and ":memory:" is per-connection
    pool: { min: 1, max: 1 },
    acquireConnectionTimeout: acquireTimeoutMs,
  });
}

export async function ensureSchema(db: Knex): Promise<void> {
  if (!(await db.schema.hasTable("runs"))) {
    await db.schema.createTable("runs", t => {
      t.string("id").primary();
      t.string("trigger").notNullable();
      t.string("started_at").notNullable();
      t.string("finished_at");
      t.string("outcome");
      t.integer("orders_created").notNullable().defaultTo(0);
      t.string("failed_stage");
      t.text("error");
    });
  }

  if (!(await db.schema.hasTable("count_orders"))) {
    await db.schema.createTable("count_orders", t => {
      t.string("id").primary();
      t.string("location_id").notNullable().index();
      t.string("name").notNullable();
      t.string("status").notNullable().index();
      t.string("run_id").notNullable().index();
      t.integer("rank").notNullable();
      t.string("reference_date").notNullable();
      t.string("created_at").notNullable();
      t.string("updated_at").notNullable();
    });
  }

  await db.raw(
    "CREATE UNIQUE INDEX IF NOT EXISTS count_orders_one_open_per_location " +
      "ON count_orders (location_id) WHERE status IN ('pending', 'dispatched')"
  );
}
