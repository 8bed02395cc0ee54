/**
 * Storage assigned to a live interval
 */
export type Location =
  | { kind: "register"; register: string }
  | { kind: "slot"; slot: number };

export namespace Location {
  export const register = (register: string): Location => ({
    kind: "register",
    register,
  });

  export const slot = (slot: number): Location => ({ kind: "slot", slot });

  export function equals(a: Location, b: Location): boolean {
    switch (a.kind) {
      case "register":
        return b.kind === "register" && a.register === b.register;
      case "slot":
        return b.kind === "slot" && a.slot === b.slot;
    }
  }

  /**
   * Text form, also usable as a map key. Slots print as `[slot N]` so
   * they never collide with a register name.
   */
  export function format(location: Location): string {
    return location.kind === "register"
      ? location.register
      : `[slot ${location.slot}]`;
  }
}
