import "reflect-metadata";
import { Logger } from "@nestjs/common";

// Silence Nest logs; specs that assert on logging spy on Logger directly.
Logger.overrideLogger(false);
