export { run } from "@oclif/core";
export * from "./lib";
export * from "./shared/errors";
