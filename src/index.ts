export * from "./errors";
export * from "./logging";
export * from "./structural";
export * from "./kind";
export * from "./schema";
export * from "./feature";
export * from "./frame";
export * from "./functions";
export * from "./parser";
export * from "./sqlParser";
export * from "./drizzleParser";
export * from "./columnar";
export * from "./closureParser";
