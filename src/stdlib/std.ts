/**
 * Purpose: Assemble the frozen standard library handed to each script execution.
 * Intent: Fresh per execution so `std.outline` records into that execution's request list
 * and std work is charged to that execution's budget.
 */

import { deepFreeze } from "../script/eval_runtime.js";
import { createArrayModule } from "./std_array.js";
import { createAssertModule } from "./std_assert.js";
import { createLogicModule } from "./std_logic.js";
import { createMathModule } from "./std_math.js";
import { createOutlineModule, type OutlineModuleContext } from "./std_outline.js";
import { makeModule, type ChargeSteps } from "./std_shared.js";
import { createTextModule } from "./std_text.js";

export type { MutationRequest, OutlineModuleContext } from "./std_outline.js";

export interface StdContext extends OutlineModuleContext {
  charge: ChargeSteps;
}

export function createStd(ctx: StdContext): Readonly<Record<string, unknown>> {
  return deepFreeze(
    makeModule({
      math: createMathModule(ctx.charge),
      text: createTextModule(ctx.charge),
      logic: createLogicModule(ctx.charge),
      array: createArrayModule(ctx.charge),
      assert: createAssertModule(),
      outline: createOutlineModule(ctx),
    })
  );
}
