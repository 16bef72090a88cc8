/**
 * Thrown before the engine runs when the requested sales windows contradict
 * each other (the expansion window must cover the replenishment window).
 */
export class InvalidWindowError extends Error {
  constructor(
    public readonly replenishmentWindowDays: number,
    public readonly expansionWindowDays: number,
  ) {
    super(
      `Expansion window (${expansionWindowDays}) is shorter than replenishment window (${replenishmentWindowDays})`,
    );
    this.name = 'INVALID_WINDOW';
  }
}
