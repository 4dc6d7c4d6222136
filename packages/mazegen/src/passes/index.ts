export * from "./carving";
export * from "./content";
