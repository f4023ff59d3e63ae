import { z } from 'zod';

/**
 * Row shapes as returned by better-sqlite3 for the ledger schema
 */

export interface ProductRow {
  id: number;
  name: string;
  price: string;
  currency: string;
  vat_percent: string;
  discount_percent: string;
  stock: number;
  points_coefficient: string;
  fixed_bonus_points: number;
}

export interface UserRow {
  id: number;
  email: string;
  total_xp: number;
  loyalty_tier_id: number | null;
}

export interface TierRow {
  id: number;
  name: string;
  description: string;
  required_level: number;
  points_multiplier: string;
  sort_order: number;
}

export interface OrderRow {
  id: number;
  uuid: string;
  user_id: number | null;
  status: string;
  payment_status: string;
  currency: string;
  shipping_price: string;
  paid_amount: string;
  metadata: string;
  tracking_number: string | null;
  carrier: string | null;
  is_deleted: number;
  created_at: string;
  updated_at: string;
  status_updated_at: string;
}

export interface OrderItemRow {
  id: number;
  order_id: number;
  product_id: number;
  product_name: string;
  unit_price: string;
  currency: string;
  quantity: number;
  original_quantity: number;
  refunded_quantity: number;
  reserved_quantity: number;
}

export interface OrderHistoryRow {
  id: number;
  order_id: number;
  change_type: string;
  previous_status: string | null;
  new_status: string | null;
  note: string;
  payload: string;
  created_at: string;
}

export interface StockLogRow {
  id: number;
  product_id: number;
  order_id: number | null;
  operation: string;
  quantity: number;
  stock_before: number;
  stock_after: number;
  reason: string;
  created_at: string;
}

export interface PointsTransactionRow {
  id: number;
  user_id: number;
  points: number;
  kind: string;
  reference_order_id: number | null;
  order_item_id: number | null;
  source_transaction_id: number | null;
  description: string;
  created_by: string | null;
  created_at: string;
}

export interface SettingRow {
  key: string;
  value: string;
}

const jsonObjectSchema = z.record(z.unknown());

/**
 * Parse a TEXT column holding a JSON object
 */
export function parseJsonObject(text: string): Record<string, unknown> {
  const value: unknown = JSON.parse(text);
  return jsonObjectSchema.parse(value);
}

export function toRowId(id: number | bigint): number {
  return Number(id);
}
