export {
  NamingPlanReporter,
  PlanFormat,
  SUPPORTED_PLAN_FORMATS,
  isPlanFormat,
  statusLabel,
} from './naming-plan-reporter';
