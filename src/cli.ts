import "reflect-metadata";
import { CommandFactory } from "nest-commander";
import { CommandsModule } from "./commands/commands.module";

async function bootstrap(): Promise<void> {
  await CommandFactory.run(CommandsModule, ["log", "warn", "error"]);
}

bootstrap().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  // eslint-disable-next-line no-console
  console.error(`[cli] ${message}`);
  process.exit(1);
});
