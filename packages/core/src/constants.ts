/**
 * Engine defaults.
 */

/** Character slots per column before indent is subtracted */
export const DEFAULT_GRID_WIDTH = 21;

/** guji template name → guji-digital template name */
export const DEFAULT_TEMPLATE_MAP: Readonly<Record<string, string>> = {
  '四库全书彩色': 'SiKuQuanShu-colored',
  '四库全书': 'default',
  '红楼梦甲戌本': 'HongLouMengJiaXuBen',
};

/** Packages the layout-mode class no longer needs */
export const DEFAULT_REMOVED_PACKAGES: readonly string[] = ['enumitem', 'tikz'];
