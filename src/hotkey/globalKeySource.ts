import { GlobalKeyboardListener, type IGlobalKeyEvent, type IGlobalKeyListener } from "node-global-key-listener";

export interface KeyEvent {
  name: string | undefined;
  state: "DOWN" | "UP";
}

export type KeyEventHandler = (event: KeyEvent) => void;

export interface KeyEventSource {
  start(handler: KeyEventHandler): Promise<void>;
  stop(): void;
}

/** System-wide key events through node-global-key-listener's platform key server. */
export class GlobalKeySource implements KeyEventSource {
  private listener?: GlobalKeyboardListener;
  private callback?: IGlobalKeyListener;

  async start(handler: KeyEventHandler): Promise<void> {
    if (this.listener) {
      throw new Error("Key source already started.");
    }
    const listener = new GlobalKeyboardListener();
    const callback: IGlobalKeyListener = (event: IGlobalKeyEvent) => {
      handler({ name: event.name, state: event.state });
    };
    this.listener = listener;
    this.callback = callback;
    try {
      await listener.addListener(callback);
    } catch (error) {
      this.stop();
      throw error;
    }
  }

  stop(): void {
    if (this.listener && this.callback) {
      this.listener.removeListener(this.callback);
    }
    this.listener?.kill();
    this.listener = undefined;
    this.callback = undefined;
  }
}
