/**
 * marketing-crew
 *
 * A crew of four AI agents (data analyst, content creator, community
 * manager, marketing strategist) that analyzes GitHub users, plans and
 * writes content campaigns and engages with a repository's community,
 * served over an HTTP API.
 */
export * from "./src/index.ts";
