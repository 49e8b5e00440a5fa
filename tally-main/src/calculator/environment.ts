import type { Expr } from "./ast.js";
import { BUILTINS, type BuiltinFn } from "./functions.js";
import type { Dec } from "./types.js";

export type CalcFunction =
  | { readonly type: "builtin"; readonly fn: BuiltinFn }
  | { readonly type: "user"; readonly params: readonly string[]; readonly body: Expr };

export type EnvMember =
  | { readonly type: "variable"; readonly value: Dec }
  | { readonly type: "function"; readonly fn: CalcFunction };

export type EnvMemberKind = EnvMember["type"];

/**
 * Session symbol table. Variables and functions share one ordered key space,
 * so assigning either kind replaces whatever the name held before.
 */
export class Environment {
  private readonly members = new Map<string, EnvMember>();
  // Kept sorted so prefix lookups touch only the matching range.
  private readonly keys: string[] = [];

  static withBuiltins(): Environment {
    const env = new Environment();
    for (const [name, fn] of Object.entries(BUILTINS)) {
      env.setFunction(name, { type: "builtin", fn });
    }
    return env;
  }

  get size(): number {
    return this.keys.length;
  }

  has(name: string): boolean {
    return this.members.has(name);
  }

  setVariable(name: string, value: Dec): void {
    this.set(name, { type: "variable", value });
  }

  getVariable(name: string): Dec | undefined {
    const member = this.members.get(name);
    return member?.type === "variable" ? member.value : undefined;
  }

  setFunction(name: string, fn: CalcFunction): void {
    this.set(name, { type: "function", fn });
  }

  getFunction(name: string): CalcFunction | undefined {
    const member = this.members.get(name);
    return member?.type === "function" ? member.fn : undefined;
  }

  /** Entries whose name starts with `prefix`, in lexicographic order. */
  *search(prefix: string): Generator<[string, EnvMember]> {
    for (let i = this.lowerBound(prefix); i < this.keys.length; i++) {
      const key = this.keys[i];
      if (key === undefined || !key.startsWith(prefix)) return;
      const member = this.members.get(key);
      if (member) yield [key, member];
    }
  }

  private set(name: string, member: EnvMember): void {
    if (!this.members.has(name)) {
      this.keys.splice(this.lowerBound(name), 0, name);
    }
    this.members.set(name, member);
  }

  private lowerBound(target: string): number {
    let lo = 0;
    let hi = this.keys.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const key = this.keys[mid];
      if (key !== undefined && key < target) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo;
  }
}
