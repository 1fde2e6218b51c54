export enum AuditLogPolicy {
  BEST_EFFORT = 'best_effort',
  STRICT = 'strict',
}

export interface AppConfig {
  port: number;
  database: {
    url: string;
  };
  sms: {
    accountSid?: string;
    authToken?: string;
    fromNumber?: string;
    statusUpdatesEnabled: boolean;
  };
  portal: {
    baseUrl: string;
    shopName: string;
  };
  audit: {
    policy: AuditLogPolicy;
  };
  storage: {
    supabaseUrl?: string;
    supabaseKey?: string;
    bucket: string;
  };
  imageSearch: {
    unsplashAccessKey?: string;
  };
  logs: {
    serviceUrl?: string;
  };
}

const blankToUndefined = (value: string | undefined): string | undefined =>
  value && value.trim() !== '' ? value.trim() : undefined;

// same spellings IsBooleanString accepts
const parseFlag = (value: string | undefined): boolean =>
  ['true', '1'].includes((value ?? '').trim().toLowerCase());

const parseAuditPolicy = (value: string | undefined): AuditLogPolicy =>
  value === AuditLogPolicy.STRICT
    ? AuditLogPolicy.STRICT
    : AuditLogPolicy.BEST_EFFORT;

export default function configuration(
  env: NodeJS.ProcessEnv = process.env,
): AppConfig {
  return {
    port: parseInt(env.PORT ?? '', 10) || 8000,
    database: {
      url: env.DB_URL || 'mongodb://localhost:27017/shop-tracker',
    },
    sms: {
      accountSid: blankToUndefined(env.TWILIO_ACCOUNT_SID),
      authToken: blankToUndefined(env.TWILIO_AUTH_TOKEN),
      fromNumber: blankToUndefined(env.TWILIO_PHONE_NUMBER),
      statusUpdatesEnabled: parseFlag(env.ENABLE_STATUS_SMS),
    },
    portal: {
      baseUrl: (env.PORTAL_BASE_URL || 'http://localhost:3000').replace(
        /\/+$/,
        '',
      ),
      shopName: env.SHOP_NAME || 'our shop',
    },
    audit: {
      policy: parseAuditPolicy(env.AUDIT_LOG_POLICY),
    },
    storage: {
      supabaseUrl: blankToUndefined(env.SUPABASE_URL),
      supabaseKey: blankToUndefined(env.SUPABASE_KEY),
      bucket: env.MEDIA_BUCKET || 'vehicle-photos',
    },
    imageSearch: {
      unsplashAccessKey: blankToUndefined(env.UNSPLASH_ACCESS_KEY),
    },
    logs: {
      serviceUrl: blankToUndefined(env.LOGS_SERVICE_URL),
    },
  };
}
