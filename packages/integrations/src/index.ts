export * from "./http/retry";
export * from "./resource-booker/records";
export * from "./resource-booker/client";
