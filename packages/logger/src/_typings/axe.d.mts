/*eslint-disable @typescript-eslint/no-explicit-any */
//axe ships no type declarations; this covers the surface the logger package uses.
//https://github.com/microsoft/TypeScript/issues/57226
declare module "axe" {
  const Axe: AxeClass;

  type AxeClass = new (
    config?: Axe.Options,
  ) => LoggerMethods & LoggerMethodAliases & Prototype;

  export type BaseLevels =
    | "trace"
    | "debug"
    | "info"
    | "warn"
    | "error"
    | "fatal";

  type LoggerMethods = {
    [K in BaseLevels]: LoggerMethod;
  };

  export interface LoggerMethodAliases {
    err: LoggerMethods["error"];
    warning: LoggerMethods["warn"];
  }

  export interface Prototype {
    log: (...args: any[]) => Promise<void>;
    setLevel(level: string): void;
    setName(name: string): void;
    config: {
      version: string;
      level: string;
      levels: string[];
    };
  }

  export type LoggerMethod = (...args: any[]) => Promise<void>;

  namespace Axe {
    /** Any console-like object exposing at least `info` or `log` */
    export type Logger = {
      info?: (...args: any[]) => void;
      log?: (...args: any[]) => void;
    } & Partial<Record<BaseLevels, (...args: any[]) => void>>;

    export interface Options {
      /**
       * Pass the Error itself (with its stack) to logger methods instead of
       * only `err.message`.
       *
       * @default true
       */
      showStack?: boolean;

      meta?: {
        /** @default true */
        show?: boolean;
        omittedFields?: string[];
        pickedFields?: (string | symbol)[];
      };

      /**
       * Skip invoking logger methods. Hooks still run.
       *
       * @default false
       */
      silent?: boolean;

      /** @default console */
      logger?: Logger;

      name?: string | boolean;

      /** @default 'info' */
      level?: string;

      /**
       * Levels that may be invoked at all.
       *
       * @default ['info','warn','error','fatal']
       */
      levels?: string[];

      /** @default true */
      appInfo?: boolean;
    }
  }

  export default Axe;
}
