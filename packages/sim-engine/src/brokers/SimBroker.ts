import { v4 as uuidv4 } from "uuid";
import type { OhlcvRow } from "@tradegym/schemas";
import type { ClosedTrade } from "@tradegym/interfaces";
import type { ExecReport, IBroker, SubmitOrder } from "./IBroker";

export type SimBrokerOptions = {
  startCash: number;
  /** Fraction of notional charged per fill. */
  commission: number;
};

type OpenTrade = { side: "long" | "short"; qty: number; openedAt: string; realized: number; fees: number };

export class SimBroker implements IBroker {
  readonly startCash: number;
  private readonly commission: number;
  private _cash: number;
  private _position = 0;
  private _avgPrice = 0;
  private bar: OhlcvRow | null = null;
  private open: OpenTrade | null = null;
  private trades: ClosedTrade[] = [];

  constructor(options: SimBrokerOptions) {
    if (!(options.startCash > 0)) throw new RangeError(`start cash must be > 0, got ${options.startCash}`);
    if (!(options.commission >= 0)) throw new RangeError(`commission must be >= 0, got ${options.commission}`);
    this.startCash = options.startCash;
    this.commission = options.commission;
    this._cash = options.startCash;
  }

  get cash(): number { return this._cash; }
  get position(): number { return this._position; }
  get avgPrice(): number { return this._avgPrice; }

  get value(): number {
    return this._cash + this._position * this.price();
  }

  mark(bar: OhlcvRow): void {
    this.bar = bar;
  }

  unrealizedPnl(): number {
    return this._position === 0 ? 0 : (this.price() - this._avgPrice) * this._position;
  }

  closedTrades(): readonly ClosedTrade[] {
    return this.trades;
  }

  submit(o: SubmitOrder): ExecReport {
    const bar = this.currentBar();
    const orderId = uuidv4();
    const rejected = (reason: string): ExecReport =>
      ({ orderId, side: o.side, submittedAt: bar.ts, fills: [], avgPrice: 0, status: "rejected", reason });

    if (!(o.qty > 0)) return rejected(`invalid quantity ${o.qty}`);
    const price = bar.close;
    const fee = o.qty * price * this.commission;
    if (o.side === "buy" && this._position >= 0 && o.qty * price + fee > this._cash) return rejected("insufficient cash");

    const signed = o.side === "buy" ? o.qty : -o.qty;
    this._cash -= signed * price + fee;
    this.apply(signed, price, fee, bar.ts);
    return {
      orderId,
      side: o.side,
      submittedAt: bar.ts,
      fills: [{ qty: o.qty, price, commission: fee, ts: bar.ts }],
      avgPrice: price,
      status: "filled"
    };
  }

  closePosition(): ExecReport | null {
    if (this._position === 0) return null;
    return this.submit({ side: this._position > 0 ? "sell" : "buy", qty: Math.abs(this._position) });
  }

  private apply(signed: number, price: number, fee: number, ts: string): void {
    const before = this._position;
    const after = before + signed;

    if (before === 0 || Math.sign(before) === Math.sign(signed)) {
      this._avgPrice = (this._avgPrice * Math.abs(before) + price * Math.abs(signed)) / Math.abs(after);
      this._position = after;
      const open: OpenTrade = this.open ?? { side: after > 0 ? "long" : "short", qty: 0, openedAt: ts, realized: 0, fees: 0 };
      open.qty = Math.max(open.qty, Math.abs(after));
      open.fees += fee;
      this.open = open;
      return;
    }

    // Reducing, closing or flipping.
    const closing = Math.min(Math.abs(signed), Math.abs(before));
    const open = this.open;
    if (open) {
      open.realized += (price - this._avgPrice) * closing * Math.sign(before);
      open.fees += fee * (closing / Math.abs(signed));
    }
    this._position = after;
    if (after !== 0 && Math.sign(after) === Math.sign(before)) return;

    if (open) {
      this.trades.push({
        side: open.side,
        qty: open.qty,
        entryPrice: this._avgPrice,
        exitPrice: price,
        pnl: open.realized - open.fees,
        openedAt: open.openedAt,
        closedAt: ts
      });
    }
    this.open = null;
    this._avgPrice = 0;
    if (after === 0) return;

    const rest = Math.abs(after);
    this._avgPrice = price;
    this.open = { side: after > 0 ? "long" : "short", qty: rest, openedAt: ts, realized: 0, fees: fee * (rest / Math.abs(signed)) };
  }

  private currentBar(): OhlcvRow {
    if (!this.bar) throw new Error("broker has no market data; mark() a bar first");
    return this.bar;
  }

  private price(): number {
    return this.bar ? this.bar.close : 0;
  }
}
