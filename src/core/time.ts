const MS_PER_DAY = 86_400_000;
const MS_PER_HOUR = 3_600_000;
const MS_PER_MINUTE = 60_000;

// Fractional days from now until endDate; negative once the date has passed
export function daysUntil(endDate: Date | undefined, now: Date): number | null {
  if (!endDate) return null;
  return (endDate.getTime() - now.getTime()) / MS_PER_DAY;
}

export function formatTimeToResolution(endDate: Date | undefined, now: Date): string {
  if (!endDate) return 'unknown';

  const remaining = endDate.getTime() - now.getTime();
  if (remaining <= 0) return 'resolved';

  const days = Math.floor(remaining / MS_PER_DAY);
  const hours = Math.floor((remaining % MS_PER_DAY) / MS_PER_HOUR);
  const minutes = Math.floor((remaining % MS_PER_HOUR) / MS_PER_MINUTE);

  if (days > 0) return `${days} days, ${hours} hours`;
  if (hours > 0) return `${hours} hours, ${minutes} minutes`;
  return `${minutes} minutes`;
}

