/**
 * Hierarchie chybových tříd pro DSL modul.
 *
 * Všechny chyby z DSL dědí z {@link DslError}, což umožňuje
 * jednoduché odchycení všech DSL chyb najednou:
 *
 * ```typescript
 * try {
 *   loadRulesFromYAML(text);
 * } catch (err) {
 *   if (err instanceof DslError) {
 *     // Chyba builderu nebo YAML loaderu
 *   }
 * }
 * ```
 */

/**
 * Základní chybová třída pro všechny DSL operace.
 *
 * Společný předek pro {@link DslValidationError}, YamlLoadError
 * a YamlValidationError.
 */
export class DslError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DslError';
  }
}

/**
 * Chyba validace vstupu v DSL builderech.
 *
 * Vyvoláváno při neplatném vstupu do builder metod (prázdný predikát,
 * neplatné jméno proměnné, confidence mimo rozsah) nebo při neúplném
 * stavu builderu v okamžiku volání `build()`.
 *
 * @example
 * ```typescript
 * try {
 *   Rule.create('r1').then(conclude('done', true)).build();
 * } catch (err) {
 *   if (err instanceof DslValidationError) {
 *     console.error('Neplatný vstup:', err.message); // chybí podmínka
 *   }
 * }
 * ```
 */
export class DslValidationError extends DslError {
  constructor(message: string) {
    super(message);
    this.name = 'DslValidationError';
  }
}
