export * from "./teams.service";
