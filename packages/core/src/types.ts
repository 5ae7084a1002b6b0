export enum Command {
  START = "/start",
  SET_API_KEY = "/set_api_key",
  FORGET_KEY = "/forget_key",
}

export type PhotoSize = {
  file_id: string;
  width?: number | undefined;
  height?: number | undefined;
};

export type IncomingMessage = {
  text?: string | undefined;
  caption?: string | undefined;
  photo?: PhotoSize[] | undefined;
};

export type MessageContext = {
  // The sender has asked to submit a credential and this is their next message.
  pending: boolean;
};

export type MessageAction =
  | { kind: "command"; command: Command }
  | { kind: "credential"; value: string }
  | { kind: "chat"; text: string }
  | { kind: "photo"; fileId: string; caption?: string }
  | { kind: "ignore" };
