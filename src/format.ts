import { levelShort } from "./level";
import type { LogcatMessage } from "./message";

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}

/**
 * Renders a message the way `logcat -v threadtime` prints it. Messages
 * without a timestamp only get the `L tag: content` part.
 */
export function formatThreadtime(message: LogcatMessage): string {
  const body = `${levelShort(message.level)} ${message.tag}: ${message.content}`;
  const { date, time } = message;
  if (!date || !time) return body;

  const stamp =
    `${pad(date.month, 2)}-${pad(date.day, 2)} ` +
    `${pad(time.hour, 2)}:${pad(time.minute, 2)}:${pad(time.second, 2)}.${pad(time.millisecond, 3)}`;
  const pid = String(message.processId ?? 0).padStart(5);
  const tid = String(message.threadId ?? 0).padStart(5);
  return `${stamp} ${pid} ${tid} ${body}`;
}
