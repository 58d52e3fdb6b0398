/** Version stamped on every score output alongside the config hash. */
export const CODE_VERSION = '1.0.0';
