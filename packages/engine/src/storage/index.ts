import type Database from "better-sqlite3";
import { AnalysesRepo } from "./repos/analyses";

export interface StorageRepos {
  analyses: AnalysesRepo;
}

export function createRepos(db: Database.Database): StorageRepos {
  return {
    analyses: new AnalysesRepo(db)
  };
}
