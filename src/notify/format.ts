import type { MotionEvent, StatsSnapshot } from '../types.js';

export const ANOMALY_SUBJECT_PREFIX = '[ANOMALY] ';

export type ComposedMessage = {
  subject: string;
  body: string;
};

export type NotificationTemplate = {
  subject: string;
  body: string;
  anomalyThreshold: number;
};

/** A threshold below one still requires at least one contour. */
export function isAnomaly(numContours: number, anomalyThreshold: number): boolean {
  return numContours >= Math.max(1, anomalyThreshold);
}

export function composeNotification(
  event: Pick<MotionEvent, 'motionArea' | 'numContours'>,
  template: NotificationTemplate,
  anomaly: boolean
): ComposedMessage {
  const lines = [
    template.body,
    '',
    `Motion area: ${event.motionArea}`,
    `Contours: ${event.numContours}`
  ];

  if (anomaly) {
    lines.push(
      `Anomaly: ${event.numContours} contours (threshold ${Math.max(1, template.anomalyThreshold)})`
    );
  }

  return {
    subject: anomaly ? `${ANOMALY_SUBJECT_PREFIX}${template.subject}` : template.subject,
    body: lines.join('\n')
  };
}

export function composeSummary(
  snapshot: StatsSnapshot,
  subject: string,
  intervalMinutes: number
): ComposedMessage {
  const average = snapshot.events > 0 ? Math.round(snapshot.totalMotionArea / snapshot.events) : 0;
  const body = [
    `Motion summary for the last ${intervalMinutes} minutes`,
    '',
    `Events: ${snapshot.events}`,
    `Anomalies: ${snapshot.anomalies}`,
    `Total motion area: ${snapshot.totalMotionArea}`,
    `Average motion area: ${average}`,
    `Max motion area: ${snapshot.maxMotionArea}`,
    `Max contours: ${snapshot.maxContours}`
  ].join('\n');

  return { subject, body };
}
