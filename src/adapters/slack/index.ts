export { createLogNotifier } from "./log.notifier";
export { createSlackClient, createSlackNotifier } from "./slack.notifier";
export type { SlackNotifierOptions } from "./slack.notifier";
