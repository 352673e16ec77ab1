export type PlainTextObject = {
  type: "plain_text";
  text: string;
  emoji?: boolean;
};

export type MrkdwnTextObject = {
  type: "mrkdwn";
  text: string;
};

export type TextObject = PlainTextObject | MrkdwnTextObject;

export type HeaderBlock = {
  type: "header";
  text: PlainTextObject;
};

export type SectionBlock = {
  type: "section";
  text?: TextObject;
  fields?: TextObject[];
};

export type DividerBlock = {
  type: "divider";
};

export type ContextBlock = {
  type: "context";
  elements: TextObject[];
};

export type MessageBlock = HeaderBlock | SectionBlock | DividerBlock | ContextBlock;

/** Slack Block Kit compatible payload; `text` is the notification fallback. */
export type MessageDocument = {
  text: string;
  blocks: MessageBlock[];
};
