export { Arena, type ReadonlyArena } from "./arena.js";
