import { z } from "zod";
import { stringArg, valueArg } from "@skein/std";

export const fileReadArgs = z.tuple([stringArg, z.enum(["utf8", "base64"]).optional()]);

export const fileWriteArgs = z.tuple([stringArg, valueArg]);

export const fileExistsArgs = z.tuple([stringArg]);

export const fileListArgs = z.tuple([stringArg]);
