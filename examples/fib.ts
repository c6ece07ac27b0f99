/**
 * Writes fib.sh, a script printing the Nth Fibonacci number.
 *
 * Run: npx tsx examples/fib.ts && sh fib.sh 10
 */

import { writeFileSync } from "node:fs";
import {
  arith,
  cmd,
  forCmd,
  newVarContaining,
  type Script,
  script,
  setVar,
  steps,
  takeParameter,
  type Var,
} from "../src/mod.ts";

const { avar, minus, plus } = arith;

export function fib(n: Var<number>): Script<Var<number>> {
  return steps((run) => {
    const prev = run(newVarContaining(1));
    const acc = run(newVarContaining(1));
    run(forCmd(cmd("seq", prev, n), () =>
      steps((run) => {
        run(setVar(acc, plus(avar(acc), avar(prev))));
        run(setVar(prev, minus(avar(acc), avar(prev))));
      })));
    return acc;
  });
}

export const fibScript = steps((run) => {
  const n = run(takeParameter<number>());
  const result = run(fib(n));
  run(cmd("echo", result));
});

if (process.argv[1]?.endsWith("fib.ts")) {
  writeFileSync("fib.sh", script(fibScript));
}
