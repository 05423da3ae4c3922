import type { NamedRegister, NamingContext } from "@pcode/model";

import type { RegisterEntry } from "./parse.js";

export const REGISTER_SPACE = "register";

/**
 * Names register-space locations from the dump's register list. An access
 * is named after the register that fully contains it; an exact match wins,
 * then the narrowest container, then declaration order.
 */
export class RegisterTable implements NamingContext {
  private readonly registers: readonly RegisterEntry[];

  constructor(registers: readonly RegisterEntry[]) {
    this.registers = registers;
  }

  registerAt(space: string, offset: bigint, size: number): NamedRegister | null {
    if (space !== REGISTER_SPACE) return null;
    const end = offset + BigInt(size);
    let best: RegisterEntry | undefined;
    for (const reg of this.registers) {
      if (reg.offset > offset || reg.offset + BigInt(reg.size) < end) continue;
      if (reg.offset === offset && reg.size === size) {
        return { name: reg.name, size: reg.size };
      }
      if (best === undefined || reg.size < best.size) {
        best = reg;
      }
    }
    return best === undefined ? null : { name: best.name, size: best.size };
  }
}
