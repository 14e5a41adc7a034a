export type MenuCommand = "select" | "focus-prev" | "focus-next" | "quit";
export type ConfigCommand = "pairs-3" | "pairs-4" | "pairs-5" | "back";
export type RunCommand = "back";

const MENU_COMMAND_BY_KEY: Readonly<Record<string, MenuCommand>> = Object.freeze({
  enter: "select",
  up: "focus-prev",
  down: "focus-next",
  q: "quit",
  escape: "quit",
});

const CONFIG_COMMAND_BY_KEY: Readonly<Record<string, ConfigCommand>> = Object.freeze({
  "3": "pairs-3",
  "4": "pairs-4",
  "5": "pairs-5",
  escape: "back",
});

const RUN_COMMAND_BY_KEY: Readonly<Record<string, RunCommand>> = Object.freeze({
  escape: "back",
});

function lookup<C extends string>(map: Readonly<Record<string, C>>, key: string): C | undefined {
  const normalized = key.toLowerCase();
  return Object.hasOwn(map, normalized) ? map[normalized] : undefined;
}

export function resolveMenuCommand(key: string): MenuCommand | undefined {
  return lookup(MENU_COMMAND_BY_KEY, key);
}

export function resolveConfigCommand(key: string): ConfigCommand | undefined {
  return lookup(CONFIG_COMMAND_BY_KEY, key);
}

export function resolveRunCommand(key: string): RunCommand | undefined {
  return lookup(RUN_COMMAND_BY_KEY, key);
}
