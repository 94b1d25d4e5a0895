export { loadConfig, type DashboardConfig } from './config';
export { DashboardService, createDashboard, type DashboardDependencies } from './services/dashboard';
export { calculateDailyBurn, type DailyBurnInput } from './services/dailyBurn';
export { compareStates } from './services/stateComparison';
export { loadDemoData, DEMO_DATA_PATH, type DemoData } from './services/demoData';
export {
  PostgresProfileRepository,
  InMemoryProfileRepository,
  DEFAULT_FOOD_COST_CENTS,
  DEFAULT_IN_OFFICE_DAYS,
  type ProfileRepository,
} from './services/profileRepository';
