import type { z } from "zod";
import type { ponderConfigSchema } from "./schema.js";

export type PonderConfig = z.output<typeof ponderConfigSchema>;

export type LoggingConfig = PonderConfig["logging"];
export type MemoryConfig = PonderConfig["memory"];
export type SelfStateConfig = PonderConfig["selfState"];
export type DrivesConfig = PonderConfig["drives"];
export type DriveDefinition = DrivesConfig["definitions"][number];
export type TraitsConfig = PonderConfig["traits"];
export type TraitDefinition = TraitsConfig["definitions"][number];
export type ValuesConfig = PonderConfig["values"];
export type PrincipleDefinition = ValuesConfig["principles"][number];
export type ExperienceConfig = PonderConfig["experience"];
export type DreamConfig = PonderConfig["dream"];
export type IdleConfig = PonderConfig["idle"];
export type ResponderConfig = PonderConfig["responder"];
export type ServerConfig = PonderConfig["server"];
export type GoalsConfig = PonderConfig["goals"];
export type AssociationsConfig = PonderConfig["associations"];
