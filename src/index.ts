// Main entry point. The store is file-system backed, so this is the Node.js build.
export * from "./node";
