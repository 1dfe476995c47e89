export { probe, formatProbeReport, type ProbeRecord } from "./ProbeReport.js";
