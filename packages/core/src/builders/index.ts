export { draft, optionalTag, repeatedTags, type Tag } from "./draft.js";
export * from "./project.js";
export * from "./conversation.js";
export * from "./task.js";
export * from "./agent.js";
