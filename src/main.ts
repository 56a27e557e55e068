import { StoreSession } from './session.js';
import { UIController } from './ui.js';

/**
 * Root application class.
 */
class App {
  private readonly session = new StoreSession();

  private readonly ui = new UIController();

  /**
   * Mounts the storefront into the page.
   */
  public init(): void {
    const root = document.querySelector<HTMLElement>('#app');
    if (!root) {
      throw new Error('Mount point #app is missing');
    }
    this.ui.init({ root, session: this.session });
    window.addEventListener('pagehide', () => this.ui.destroy(), { once: true });
  }
}

new App().init();
