export const PACKAGE_NAME = "@hashroute/test-utils" as const;

export { MockRemapRequest, type MockRemapRequestInit } from "./remap-request.js";
