export type ButtonVariant = 'primary' | 'ghost' | 'danger';
export type ButtonSize = 'sm' | 'md';

export interface ButtonProps {
  label?: string;
  variant?: ButtonVariant;
  size?: ButtonSize;
  disabled?: boolean;
  type?: 'button' | 'submit';
  onClick?: (event: MouseEvent) => void;
  className?: string;
  ariaLabel?: string;
}

const variantClass: Record<ButtonVariant, string | undefined> = {
  primary: 'btn--accent',
  ghost: undefined,
  danger: 'btn--danger',
};

const sizeClass: Record<ButtonSize, string | undefined> = {
  md: undefined,
  sm: 'btn--sm',
};

function classList(variant: ButtonVariant, size: ButtonSize, className?: string): string {
  const tokens = ['btn'];
  const variantToken = variantClass[variant];
  if (variantToken) tokens.push(variantToken);
  const sizeToken = sizeClass[size];
  if (sizeToken) tokens.push(sizeToken);
  if (className) {
    for (const token of className.split(/\s+/)) {
      if (token) tokens.push(token);
    }
  }
  return tokens.join(' ');
}

export interface ButtonElement {
  readonly el: HTMLButtonElement;
  update(next: Partial<ButtonProps>): void;
}

export function createButton(props: ButtonProps = {}): ButtonElement {
  const el = document.createElement('button');
  el.dataset.ui = 'button';
  let current: ButtonProps = { variant: 'ghost', size: 'md', ...props };

  const sync = () => {
    el.type = current.type ?? 'button';
    el.disabled = current.disabled ?? false;
    el.className = classList(current.variant ?? 'ghost', current.size ?? 'md', current.className);
    if (current.label !== undefined) el.textContent = current.label;
    if (current.ariaLabel) el.setAttribute('aria-label', current.ariaLabel);
    else el.removeAttribute('aria-label');
  };

  sync();

  if (props.onClick) {
    el.addEventListener('click', props.onClick);
  }

  return {
    el,
    update(next) {
      current = { ...current, ...next };
      sync();
    },
  };
}

export default createButton;
