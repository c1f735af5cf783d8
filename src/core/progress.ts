// src/core/progress.ts
import chalk from 'chalk';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function formatClock(date: Date): string {
  return `[${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}]`;
}

export function step(message: string, now: Date = new Date()): void {
  console.log(`${formatClock(now)} - ${message}`);
}

export function warn(message: string): void {
  console.log(`${chalk.yellow(' [WARNING]')} - ${message}`);
}
