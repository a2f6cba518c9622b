import * as Rnd from "seedrandom";

type Generator = () => number;

function unpredictableSeed(): string {
  const now = new Date();
  return now.toString() + now.getTime() + Math.random();
}

/**
 * Random source behind the `random` opcode: unpredictable by default,
 * switched to a repeatable sequence when the game (or the host) seeds it.
 */
export class ZRandom {
  private gen: Generator;

  constructor(seed?: number) {
    this.gen = seed === undefined ? Rnd.alea(unpredictableSeed()) : Rnd.alea(seed.toString());
  }

  // Uniform integer in [1, range]
  next(range: number): number {
    return Math.floor(this.gen() * range) + 1;
  }

  /**
   * Negative values give a repeatable sequence for that value; 0 goes back
   * to an unpredictable one.
   */
  seed(n: number): void {
    this.gen = n === 0 ? Rnd.alea(unpredictableSeed()) : Rnd.alea(n.toString());
  }
}
