import type { MessageDocument } from "../domain/message.types";

export type NotificationKind =
  | "access-granted"
  | "access-expired"
  | "access-revoked"
  | "bucket-access-granted"
  | "bucket-access-revoked";

export type AccessNotification = {
  kind: NotificationKind;
  requester: string;
  document: MessageDocument;
};

export type Notifier = {
  notify: (notification: AccessNotification) => Promise<void>;
};
