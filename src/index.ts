export * from "./types";
export * from "./core/errors";
export * from "./core/types";
export * from "./core/hash";
export * from "./core/gas";
export * from "./core/messageBox";
export * from "./core/registry";
export * from "./trie/trie";
export * from "./trie/proof";
export * from "./gateway/types";
export * from "./gateway/base";
export * from "./gateway/link";
export * from "./gateway/gateway";
export * from "./gateway/coGateway";
export * from "./chain/anchor";
export * from "./chain/ledger";
export * from "./chain/runtime";
export * from "./chain/deploy";
export * from "./infra/facilitator";
export * from "./model/validation";
export * from "./config";
export * from "./logging";
