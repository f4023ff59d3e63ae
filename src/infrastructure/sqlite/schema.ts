// ---------------------------------------------------------------------------
// Ledger schema. Money amounts are exact decimal strings; timestamps are
// ISO-8601 UTC strings so they sort lexicographically.
// ---------------------------------------------------------------------------

export const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS loyalty_tiers (
    id                INTEGER PRIMARY KEY AUTOINCREMENT,
    name              TEXT    NOT NULL,
    description       TEXT    NOT NULL DEFAULT '',
    required_level    INTEGER NOT NULL UNIQUE CHECK (required_level >= 1),
    points_multiplier TEXT    NOT NULL DEFAULT '1.0',
    sort_order        INTEGER NOT NULL DEFAULT 0
  );

  CREATE TABLE IF NOT EXISTS users (
    id              INTEGER PRIMARY KEY AUTOINCREMENT,
    email           TEXT    NOT NULL UNIQUE,
    total_xp        INTEGER NOT NULL DEFAULT 0 CHECK (total_xp >= 0),
    loyalty_tier_id INTEGER REFERENCES loyalty_tiers(id) ON DELETE SET NULL
  );

  CREATE TABLE IF NOT EXISTS products (
    id                 INTEGER PRIMARY KEY AUTOINCREMENT,
    name               TEXT    NOT NULL,
    price              TEXT    NOT NULL,
    currency           TEXT    NOT NULL,
    vat_percent        TEXT    NOT NULL DEFAULT '0',
    discount_percent   TEXT    NOT NULL DEFAULT '0',
    stock              INTEGER NOT NULL DEFAULT 0 CHECK (stock >= 0),
    points_coefficient TEXT    NOT NULL DEFAULT '1',
    fixed_bonus_points INTEGER NOT NULL DEFAULT 0 CHECK (fixed_bonus_points >= 0)
  );

  CREATE TABLE IF NOT EXISTS orders (
    id                INTEGER PRIMARY KEY AUTOINCREMENT,
    uuid              TEXT    NOT NULL UNIQUE,
    user_id           INTEGER REFERENCES users(id),
    status            TEXT    NOT NULL,
    payment_status    TEXT    NOT NULL,
    currency          TEXT    NOT NULL,
    shipping_price    TEXT    NOT NULL DEFAULT '0',
    paid_amount       TEXT    NOT NULL DEFAULT '0',
    metadata          TEXT    NOT NULL DEFAULT '{}',
    tracking_number   TEXT,
    carrier           TEXT,
    is_deleted        INTEGER NOT NULL DEFAULT 0,
    created_at        TEXT    NOT NULL,
    updated_at        TEXT    NOT NULL,
    status_updated_at TEXT    NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_orders_user ON orders(user_id, created_at);

  CREATE TABLE IF NOT EXISTS order_items (
    id                INTEGER PRIMARY KEY AUTOINCREMENT,
    order_id          INTEGER NOT NULL REFERENCES orders(id) ON DELETE CASCADE,
    product_id        INTEGER NOT NULL REFERENCES products(id),
    product_name      TEXT    NOT NULL,
    unit_price        TEXT    NOT NULL,
    currency          TEXT    NOT NULL,
    quantity          INTEGER NOT NULL CHECK (quantity > 0),
    original_quantity INTEGER NOT NULL,
    refunded_quantity INTEGER NOT NULL DEFAULT 0
      CHECK (refunded_quantity >= 0 AND refunded_quantity <= quantity),
    reserved_quantity INTEGER NOT NULL DEFAULT 0 CHECK (reserved_quantity >= 0)
  );

  CREATE INDEX IF NOT EXISTS idx_order_items_order ON order_items(order_id);

  CREATE TABLE IF NOT EXISTS order_history (
    id              INTEGER PRIMARY KEY AUTOINCREMENT,
    order_id        INTEGER NOT NULL REFERENCES orders(id) ON DELETE CASCADE,
    change_type     TEXT    NOT NULL,
    previous_status TEXT,
    new_status      TEXT,
    note            TEXT    NOT NULL DEFAULT '',
    payload         TEXT    NOT NULL DEFAULT '{}',
    created_at      TEXT    NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_order_history_order ON order_history(order_id, id);

  CREATE TABLE IF NOT EXISTS stock_logs (
    id           INTEGER PRIMARY KEY AUTOINCREMENT,
    product_id   INTEGER NOT NULL REFERENCES products(id),
    order_id     INTEGER,
    operation    TEXT    NOT NULL CHECK (operation IN ('RESERVE', 'RESTORE')),
    quantity     INTEGER NOT NULL,
    stock_before INTEGER NOT NULL,
    stock_after  INTEGER NOT NULL,
    reason       TEXT    NOT NULL DEFAULT '',
    created_at   TEXT    NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_stock_logs_product ON stock_logs(product_id, id);

  CREATE TABLE IF NOT EXISTS points_transactions (
    id                    INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id               INTEGER NOT NULL REFERENCES users(id),
    points                INTEGER NOT NULL,
    kind                  TEXT    NOT NULL
      CHECK (kind IN ('EARN', 'REDEEM', 'EXPIRE', 'ADJUST', 'BONUS')),
    reference_order_id    INTEGER REFERENCES orders(id),
    order_item_id         INTEGER,
    source_transaction_id INTEGER REFERENCES points_transactions(id),
    description           TEXT    NOT NULL DEFAULT '',
    created_by            TEXT,
    created_at            TEXT    NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_points_user_created
    ON points_transactions(user_id, created_at);

  CREATE INDEX IF NOT EXISTS idx_points_order
    ON points_transactions(reference_order_id, kind);

  CREATE UNIQUE INDEX IF NOT EXISTS uq_points_earn_line
    ON points_transactions(reference_order_id, order_item_id)
    WHERE kind = 'EARN';

  CREATE UNIQUE INDEX IF NOT EXISTS uq_points_expire_source
    ON points_transactions(source_transaction_id)
    WHERE kind = 'EXPIRE';

  CREATE TRIGGER IF NOT EXISTS points_transactions_no_update
    BEFORE UPDATE ON points_transactions
    BEGIN
      SELECT RAISE(ABORT, 'points_transactions is append-only');
    END;

  CREATE TRIGGER IF NOT EXISTS points_transactions_no_delete
    BEFORE DELETE ON points_transactions
    BEGIN
      SELECT RAISE(ABORT, 'points_transactions is append-only');
    END;

  CREATE TABLE IF NOT EXISTS settings (
    key   TEXT PRIMARY KEY,
    value TEXT NOT NULL
  );
`;
