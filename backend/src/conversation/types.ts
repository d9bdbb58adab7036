import type { OutboundMessage } from '@dosebell/shared';
import type * as medicineService from '../services/medicineService.js';
import type { TimezoneCatalog } from '../config/timezones.js';

export type MedicineOperations = Omit<typeof medicineService, '__setEventBusForTests'>;

export interface FlowContext {
  userId: number;
  username: string | null;
  timezones: TimezoneCatalog;
  medicines: MedicineOperations;
}

export interface FlowStep {
  replies: OutboundMessage[];
  /** The session ends; the router shows the main menu. */
  done: boolean;
  /** Hand the session over to another flow, which is started right away. */
  next?: ConversationFlow;
}

export interface ConversationFlow {
  readonly name: string;
  start(): Promise<FlowStep>;
  handle(text: string): Promise<FlowStep>;
  cancel(): FlowStep;
}

export function reply(...replies: OutboundMessage[]): FlowStep {
  return { replies, done: false };
}

export function finish(...replies: OutboundMessage[]): FlowStep {
  return { replies, done: true };
}
