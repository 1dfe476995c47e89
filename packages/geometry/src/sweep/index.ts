export {
  generateStenosisSweep,
  linspace,
  frameName,
  DEFAULT_SWEEP_OPTIONS,
  SWEEP_NARROWING,
  type StenosisSweep,
  type StenosisSweepOptions,
  type SweepFrame,
} from "./StenosisSweep.js";
