export * from "./rotation";
export * from "./rotation-member";
export * from "./rotation-override";
