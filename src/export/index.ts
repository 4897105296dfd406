export { exportStl } from "./stl.js";

export { export3mf, formatNum } from "./three_mf.js";
export type { ThreeMfExportOptions, ThreeMfObject, ThreeMfUnit } from "./three_mf.js";

export { exportHub, generateAndExport, placeMesh, VARIANT_COLORS } from "./hub.js";
export type { HubExportOptions, HubExportResult, HubRunOptions } from "./hub.js";
