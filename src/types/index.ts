import type { Cents } from '../lib/money';

export interface Brand {
  id: number;
  name: string;
  dailyBudget: Cents;
  monthlyBudget: Cents;
  createdAt: string;
  updatedAt: string;
}

export interface BrandInput {
  name: string;
  dailyBudget?: Cents;
  monthlyBudget?: Cents;
}

export interface Campaign {
  id: number;
  brandId: number;
  name: string;
  /** 0 defers to the brand cap only */
  dailyBudget: Cents;
  monthlyBudget: Cents;
  active: boolean;
  startDate: string | null;
  endDate: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface CampaignInput {
  name: string;
  dailyBudget?: Cents;
  monthlyBudget?: Cents;
  active?: boolean;
  startDate?: string | null;
  endDate?: string | null;
}

export interface Schedule {
  id: number;
  campaignId: number;
  startHour: number;
  endHour: number;
}

export interface ScheduleInput {
  startHour: number;
  endHour: number;
}

export interface Expense {
  id: number;
  campaignId: number;
  amount: Cents;
  date: string;
  notes: string | null;
  createdAt: string;
}

export interface ExpenseInput {
  campaignId: number;
  amount: Cents;
  date: string;
  notes?: string | null;
}

export interface DateRange {
  from?: string;
  to?: string;
}
