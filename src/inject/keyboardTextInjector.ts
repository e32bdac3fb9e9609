import { Key, keyboard } from "@computer-use/nut-js";
import { InjectionError, describeError } from "../errors";
import type { ITextInjector } from "../types/contracts";

/** What the injector needs from nut-js's keyboard. */
export interface KeyboardDriver {
  type(text: string): Promise<unknown>;
  pressEnter(): Promise<unknown>;
}

const nutKeyboard: KeyboardDriver = {
  type: (text) => keyboard.type(text),
  pressEnter: async () => {
    await keyboard.pressKey(Key.Enter);
    await keyboard.releaseKey(Key.Enter);
  }
};

/** Types text into whatever window has focus. Line breaks become Enter presses. */
export class KeyboardTextInjector implements ITextInjector {
  constructor(
    private readonly trailingSpace: boolean,
    private readonly driver: KeyboardDriver = nutKeyboard
  ) {
    if (driver === nutKeyboard) {
      keyboard.config.autoDelayMs = 0;
    }
  }

  async insert(text: string): Promise<void> {
    const textToInsert = this.trailingSpace ? text + " " : text;
    const lines = textToInsert.split("\n");

    try {
      for (let i = 0; i < lines.length; i++) {
        if (i > 0) {
          await this.driver.pressEnter();
        }
        if (lines[i]) {
          await this.driver.type(lines[i]);
        }
      }
    } catch (error) {
      throw new InjectionError(`Typing failed: ${describeError(error)}`, error);
    }
  }
}
