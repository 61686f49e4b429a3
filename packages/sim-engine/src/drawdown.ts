/** Running peak-to-trough tracker over portfolio values, in percent of the peak. */
export class DrawdownTracker {
  private peak = -Infinity;
  private troughLen = 0;
  drawdown = 0;
  moneydown = 0;
  maxDrawdown = 0;
  maxMoneydown = 0;
  maxLen = 0;

  update(value: number): void {
    if (value >= this.peak) {
      this.peak = value;
      this.troughLen = 0;
    } else {
      this.troughLen += 1;
    }
    this.moneydown = this.peak - value;
    this.drawdown = this.peak > 0 ? (100 * this.moneydown) / this.peak : 0;
    this.maxDrawdown = Math.max(this.maxDrawdown, this.drawdown);
    this.maxMoneydown = Math.max(this.maxMoneydown, this.moneydown);
    this.maxLen = Math.max(this.maxLen, this.troughLen);
  }
}
