import type { CellDefinition } from "../cell.ts"
import { Calculator } from "./calculator.ts"
import { Greeter } from "./greeter.ts"
import { JsonEcho } from "./json-echo.ts"
import { Primes } from "./primes.ts"

export { Calculator, Greeter, JsonEcho, Primes }

export const builtinCells: ReadonlyArray<CellDefinition> = [Greeter, Calculator, JsonEcho, Primes]

export const builtinCellIds: ReadonlyArray<string> = builtinCells.map((definition) => definition.id)
