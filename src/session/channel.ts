export type ControlStyle = "danger" | "secondary" | "success" | "primary";

export type MessageControl = {
  /** Action token decoded back by `decodeActionToken` when the control is used. */
  readonly id: string;
  readonly label: string;
  readonly style: ControlStyle;
};

export type OutboundImage = {
  readonly data: Buffer;
  readonly filename: string;
};

export type OutboundMessage = {
  readonly content?: string;
  readonly images: readonly OutboundImage[];
  readonly controls: readonly MessageControl[];
};

/** The chat surface a session posts to; platform rendering lives behind it. */
export type SessionChannel = {
  post: (message: OutboundMessage) => Promise<void>;
};

export function imageFilename(seed: number): string {
  return `output_${seed}.png`;
}
