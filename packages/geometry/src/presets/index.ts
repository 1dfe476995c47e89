/**
 * Ready-made vessel trees.
 */

export {
  buildBifurcation,
  type Bifurcation,
  type BifurcationOptions,
} from "./bifurcation.js";
export {
  buildAbdominalAorta,
  type AbdominalAorta,
  type AbdominalArtery,
} from "./abdominalAorta.js";
