/**
 * Sekvenční generátor ID vlastněný konkrétní instancí (store, agenda, trace).
 * Žádný globální stav - každá instance začíná od 1 a resetuje se s ní.
 */
export class SequentialIdGenerator {
  private counter = 0;

  constructor(
    private readonly prefix: string,
    private readonly width = 4
  ) {}

  /** Vrátí další ID: "F0001", "F0002", ... */
  next(): string {
    this.counter++;
    return `${this.prefix}${String(this.counter).padStart(this.width, '0')}`;
  }

  /** Poslední vydané pořadové číslo */
  get current(): number {
    return this.counter;
  }

  reset(): void {
    this.counter = 0;
  }
}
