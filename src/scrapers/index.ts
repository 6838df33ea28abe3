/**
 * scrapers/index.ts — Portal access: the driver contract, its Puppeteer
 * implementation and the markup parsers both sides share.
 */

export type { OpenedClass, PortalContext, PortalDriver, PortalProfile } from './portalDriver';
export { PuppeteerPortalDriver } from './puppeteerPortal';
export type { PuppeteerPortalOptions } from './puppeteerPortal';
export {
  SELECTORS,
  findClassRow,
  hasEvaluationWarning,
  looksLikeLoginPage,
  parseClassLabel,
  parseGradesList,
  parsePeriodTabs,
  parsePortalTable,
  parseProfile,
  pickPeriodTab,
} from './portalMarkup';
export type { ClassRow, PeriodTab } from './portalMarkup';
