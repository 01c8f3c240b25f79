export * from "./network/intersectionNetwork";
export * from "./bridges/spokeBridge";
export * from "./policies";
export * from "./sink/uncertaintySink";
export * from "./sink/ledger";
export * from "./synthesis/factors";
export * from "./synthesis/synthesizer";
export * from "./synthesis/deviation";
export * from "./verification/observers";
export * from "./verification/verifier";
