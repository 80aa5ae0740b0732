export * from "./rpc.js";
export * from "./wallet.js";
