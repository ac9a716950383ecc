// neo-blessed ships no type declarations; this covers the Program surface in use.
declare module "neo-blessed" {
  namespace blessed {
    interface KeyInfo {
      name?: string;
      full?: string;
      sequence?: string;
      ctrl: boolean;
      meta: boolean;
      shift: boolean;
    }

    interface ProgramOptions {
      input?: NodeJS.ReadableStream;
      output?: NodeJS.WritableStream;
      buffer?: boolean;
      tput?: boolean;
    }

    interface Program {
      cols: number;
      rows: number;
      alternateBuffer(): boolean;
      normalBuffer(): boolean;
      hideCursor(): boolean;
      showCursor(): boolean;
      clear(): boolean;
      cup(row: number, col: number): boolean;
      sgr(attr: string): boolean;
      write(text: string): boolean;
      flush(): void;
      destroy(): void;
      on(
        event: "keypress",
        listener: (ch: string | undefined, key: KeyInfo | undefined) => void,
      ): this;
      on(event: "resize", listener: () => void): this;
    }

    function program(options?: ProgramOptions): Program;
  }

  export = blessed;
}
