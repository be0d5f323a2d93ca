export { warnInDevelopment } from "./development";
export { generateId, type IdGenerator } from "./id";
