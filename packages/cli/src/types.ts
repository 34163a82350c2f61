/** Options registered on the root program and shared by every command */
export type GlobalOptions = {
  json?: boolean;
  config?: string;
  verbose?: boolean;
  nonInteractive?: boolean;
};
