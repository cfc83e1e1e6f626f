/** A queued player. Identity is `id`; two players with equal stats are still distinct. */
export interface Player {
  readonly id: number;
  readonly rating: number;
  /** Net wins over the last 10 matches, in [-10, 10]. */
  readonly form: number;
  /** Queue entry time on the caller's clock. Reporting only. */
  readonly joinTime: number;
}
