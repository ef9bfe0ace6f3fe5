export * from "./models/users";
export * from "./models/scheduling";
export * from "./models/messaging";
export * from "./models/system";
