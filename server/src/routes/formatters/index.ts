export {
  formatStatusMap,
  formatStatusOverview,
  formatServiceStatus,
  formatStatusCreated,
  formatStatusSummary,
} from './statusFormatter';

export * from './types';
