import type { OhlcvRow } from "@tradegym/schemas";
import type { ClosedTrade } from "@tradegym/interfaces";

export type OrderSide = "buy" | "sell";

export interface SubmitOrder {
  side: OrderSide;
  qty: number;
}

export interface Fill { qty: number; price: number; commission: number; ts: string; }

export interface ExecReport {
  orderId: string;
  side: OrderSide;
  submittedAt: string;
  fills: Fill[];
  avgPrice: number;
  status: "filled" | "rejected";
  reason?: string;
}

/** Bar-driven broker: orders fill against the last marked bar. */
export interface IBroker {
  readonly startCash: number;
  readonly cash: number;
  /** Signed quantity: positive long, negative short. */
  readonly position: number;
  readonly avgPrice: number;
  readonly value: number;
  mark(bar: OhlcvRow): void;
  submit(o: SubmitOrder): ExecReport;
  /** Flattens the position; null when already flat. */
  closePosition(): ExecReport | null;
  unrealizedPnl(): number;
  closedTrades(): readonly ClosedTrade[];
}
