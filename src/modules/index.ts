/**
 * Pipeline modules export
 */

export { scan } from "./scanner";
export { extract } from "./extractor";
export { write } from "./writer";
export { stats } from "./stats";
