/** Hodnota faktu - skalár nebo kolekce (JSON-kompatibilní). */
export type FactValue =
  | string
  | number
  | boolean
  | null
  | FactValue[]
  | { [key: string]: FactValue };

/** Druh faktu v pracovní paměti */
export type FactKind = 'initial' | 'derived' | 'conclusion';

interface FactBase {
  id: string;               // "F0001"
  predicate: string;        // Název predikátu: "location"
  value: FactValue;
  confidence: number;       // 0..1, pouze se předává dál
  justification: string;
  timestamp: number;        // Monotónní pořadí v rámci store
  assertedAt: number;       // Wall-clock (ms) pro zobrazení
}

/** Vstupní fakt - nikdy nemá původní pravidlo */
export interface InitialFact extends FactBase {
  kind: 'initial';
  originRule?: undefined;
}

/** Odvozený fakt nebo závěr - vždy nese ID pravidla */
export interface InferredFact extends FactBase {
  kind: 'derived' | 'conclusion';
  originRule: string;
}

/** Fakt - neměnný záznam v pracovní paměti */
export type Fact = InitialFact | InferredFact;

/** Záznam v historii pracovní paměti */
export interface FactHistoryEntry {
  sequence: number;
  factId: string;
  kind: FactKind;
  predicate: string;
  value: FactValue;
  originRule?: string;
  confidence: number;
  justification: string;
}

/** Počty faktů podle druhu */
export interface FactSummary {
  total: number;
  byKind: Record<FactKind, number>;
}
