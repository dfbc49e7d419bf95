/**
 * Mutable state shared by the chat loop and the code that reacts to relay
 * callbacks: status text, the redraw flag and the quit request.
 */
export class ViewState {
  private text: string;
  private redrawNeeded = true;
  private quit = false;

  constructor(initialStatus = 'Starting...') {
    this.text = initialStatus;
  }

  get status(): string {
    return this.text;
  }

  get dirty(): boolean {
    return this.redrawNeeded;
  }

  get quitRequested(): boolean {
    return this.quit;
  }

  setStatus(text: string): void {
    this.text = text;
    this.redrawNeeded = true;
  }

  markDirty(): void {
    this.redrawNeeded = true;
  }

  markDrawn(): void {
    this.redrawNeeded = false;
  }

  requestQuit(): void {
    this.quit = true;
  }
}
