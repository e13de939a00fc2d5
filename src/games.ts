export interface Game {
  title: string;
  app_id: string;
  /** Save directory inside the Proton prefix, relative to compatdata/<app_id>. */
  compat_save_path: string;
  /** Extension a file must carry for the compat store to count as holding saves. */
  save_extension: string;
  /** Extensions copied between hosts. */
  extensions: string[];
}

export const DEFAULT_GAME = "slime-rancher";

export const GAMES: Record<string, Game> = {
  "slime-rancher": {
    title: "Slime Rancher",
    app_id: "433340",
    compat_save_path: "pfx/drive_c/users/steamuser/AppData/LocalLow/Monomi Park/Slime Rancher",
    save_extension: ".sav",
    extensions: [".sav", ".cfg", ".prf"],
  },
};

export function getGame(name: string): Game | undefined {
  return GAMES[name];
}

export function listGames(): Record<string, Game> {
  return { ...GAMES };
}
