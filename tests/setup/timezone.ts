// Daily keys are local dates; pin a zone that observes DST so day-boundary
// tests see 23- and 25-hour days.
export default function globalSetup(): void {
  process.env.TZ = 'America/New_York';
}
