export * from "./rankings.service";
