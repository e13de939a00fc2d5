import { Command } from "commander";
import { DEFAULT_GAME, listGames } from "../games.js";
import { info, heading, styled, blank } from "../ui.js";

export const listGamesCommand = new Command("list-games")
  .description("Show the games whose saves can be transferred")
  .action(() => {
    blank();
    heading("Supported games");
    blank();

    for (const [name, game] of Object.entries(listGames())) {
      const suffix = name === DEFAULT_GAME ? " (default)" : "";
      info(styled(`${name}${suffix}`, { bold: true }));
      info(`  Title: ${game.title}`);
      info(`  Steam app id: ${game.app_id}`);
      info(`  Proton save path: ${game.compat_save_path}`);
      info(`  File types: ${game.extensions.join(", ")}`);
      blank();
    }
  });
