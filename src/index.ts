export * from "./plume";
