import createButton, { type ButtonElement } from '@ui/Button';

export interface ErrorBannerProps {
  message: string;
  onDismiss?: () => void;
}

export interface ErrorBannerElement {
  readonly el: HTMLDivElement;
  update(next: Partial<ErrorBannerProps>): void;
}

export function createErrorBanner(props: ErrorBannerProps): ErrorBannerElement {
  const root = document.createElement('div');
  root.className = 'error-banner';
  root.dataset.ui = 'error-banner';
  root.setAttribute('role', 'alert');

  const messageEl = document.createElement('span');
  messageEl.className = 'error-banner__message';

  const actions = document.createElement('div');
  actions.className = 'error-banner__actions';

  root.append(messageEl, actions);

  let currentMessage = props.message;
  let currentOnDismiss = props.onDismiss ?? null;
  let dismissButton: ButtonElement | null = null;

  const syncDismiss = () => {
    if (!currentOnDismiss) {
      dismissButton?.el.remove();
      dismissButton = null;
      actions.hidden = true;
      return;
    }

    if (!dismissButton) {
      dismissButton = createButton({
        label: 'Dismiss',
        variant: 'ghost',
        size: 'sm',
        className: 'error-banner__dismiss',
        onClick: (event) => {
          event.preventDefault();
          currentOnDismiss?.();
        },
      });
    }
    if (!dismissButton.el.isConnected) actions.appendChild(dismissButton.el);
    actions.hidden = false;
  };

  const sync = () => {
    messageEl.textContent = currentMessage;
    syncDismiss();
  };

  sync();

  return {
    el: root,
    update(next) {
      if (next.message !== undefined) currentMessage = next.message;
      if (next.onDismiss !== undefined) currentOnDismiss = next.onDismiss ?? null;
      sync();
    },
  };
}

export default createErrorBanner;
