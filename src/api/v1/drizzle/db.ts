import { drizzle } from "drizzle-orm/node-postgres";
import { DATABASE_URL } from "../config/env";
import * as schema from "./schema";

export const db = drizzle(DATABASE_URL, { schema });

export type Database = typeof db;
export type Transaction = Parameters<Parameters<Database["transaction"]>[0]>[0];
