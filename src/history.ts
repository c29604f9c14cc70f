import type { Drum, Pallet } from './types.js';

export type HistoryPeriod = 'all' | 'today' | 'month' | 'year' | 'range';

export interface HistoryFilter {
  period: HistoryPeriod;
  /** Inclusive `YYYY-MM-DD` bounds, used when `period` is `range`. */
  from?: string;
  to?: string;
  materialFilter?: string;
}

export interface HistoryView {
  pallets: Pallet[];
  drums: Drum[];
}

function utcDay(value: string): string | null {
  if (!value) {
    return null;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date.toISOString().slice(0, 10);
}

export function matchesPeriod(value: string, filter: HistoryFilter, now: Date): boolean {
  if (filter.period === 'all') {
    return true;
  }
  if (filter.period === 'range' && (!filter.from || !filter.to)) {
    return true;
  }

  const day = utcDay(value);
  if (!day) {
    return false;
  }
  const today = now.toISOString().slice(0, 10);

  switch (filter.period) {
    case 'today':
      return day === today;
    case 'month':
      return day.slice(0, 7) === today.slice(0, 7);
    case 'year':
      return day.slice(0, 4) === today.slice(0, 4);
    case 'range':
      return day >= (filter.from ?? '') && day <= (filter.to ?? '');
  }
}

function matchesMaterial(materialCode: string, materialFilter: string | undefined): boolean {
  const needle = materialFilter?.trim().toLowerCase();
  return !needle || materialCode.toLowerCase().includes(needle);
}

export function filterHistory(view: HistoryView, filter: HistoryFilter, now: Date = new Date()): HistoryView {
  return {
    pallets: view.pallets.filter(
      pallet => matchesPeriod(pallet.createdAt, filter, now) && matchesMaterial(pallet.materialCode, filter.materialFilter)
    ),
    drums: view.drums.filter(
      drum => matchesPeriod(drum.timestamp, filter, now) && matchesMaterial(drum.materialCode, filter.materialFilter)
    )
  };
}
