export * from "./draftOrder.js";
export * from "./draftState.js";
export * from "./search.js";
