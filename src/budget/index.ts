/**
 * 予算台帳・消化記録
 */

export {
  BudgetLedger,
  dailyBudgetRemaining,
  monthlyBudgetRemaining,
  isDailyBudgetExceeded,
  isMonthlyBudgetExceeded,
  isAnyBudgetExceeded,
  getSpend,
  getBudget,
  withSpendReset,
} from "./budget-ledger";
export { SpendRecorder } from "./spend-recorder";
