export * from "./types";
export { DEFAULT_CONFIG, loadConfig, requireLeagueId } from "./loadConfig";
