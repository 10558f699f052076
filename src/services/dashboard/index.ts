export { CostDashboard, type DashboardOptions } from './dashboard';
