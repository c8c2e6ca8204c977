export { consistent, intersectsRange, matchesRecord } from "./intersect";
export { findVulnerabilities } from "./match";
