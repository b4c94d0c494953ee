import { bgBlack, bgBlue, bgGray, greenBright, red, yellow } from "ansis";
import { inspect as nodeInspect } from "util";

export namespace log {
  export type Level = "trace" | "debug" | "info" | "silent";

  const rank: Record<Level, number> = { trace: 0, debug: 1, info: 2, silent: 3 };

  let current: Level = "info";

  export const setLevel = (level: Level) => {
    current = level;
  };

  export const getLevel = (): Level => current;

  const enabled = (level: Level) => rank[level] >= rank[current];

  const write = (marker: string, message: string, args?: unknown) => {
    console.log(`${new Date().toISOString()} ${marker} ${message}`);
    if (args !== undefined) {
      console.log(nodeInspect(args, { depth: null, colors: true, sorted: true }));
    }
  };

  export namespace debugging {
    export const inspect = (label: string, args: unknown) => {
      if (enabled("debug")) {
        write("🐛", bgGray(label), args);
      }
    };
  }

  export const info = (message: string, args?: unknown) => {
    if (enabled("info")) {
      write("ℹ️", bgBlue(message), args);
    }
  };

  export const debug = (message: string, args?: unknown) => {
    if (enabled("debug")) {
      write("🐛", bgGray(message), args);
    }
  };

  export const trace = (message: string, args?: unknown) => {
    if (enabled("trace")) {
      write("🔍", bgBlack(message), args);
    }
  };

  export const success = (message: string, args?: unknown) => {
    if (enabled("info")) {
      write("✅", greenBright(message), args);
    }
  };

  export const warning = (message: string, args?: unknown) => {
    if (enabled("info")) {
      write("⚠️", yellow(message), args);
    }
  };

  export const error = (message: string, args?: unknown) => {
    if (enabled("info")) {
      write("❌", red(message), args);
    }
  };
}
