export interface EnumVariant {
  name: string;
  value?: number;
  description?: string;
}

export interface EnumDefinition {
  name: string;
  description?: string;
  variants: EnumVariant[];
}

export type EnumChange =
  | { type: 'renamed'; name: string }
  | { type: 'description-changed' }
  | { type: 'variant-added'; variant: string }
  | { type: 'variant-removed'; variant: string }
  | { type: 'variant-updated'; variant: string }
  | { type: 'saved' }
  | { type: 'reloaded' };
