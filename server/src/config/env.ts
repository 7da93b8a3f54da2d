import dotenv from 'dotenv';

dotenv.config();

export type StoreDriver = 'supabase' | 'memory';

function parseNumber(raw: string | undefined, fallback: number): number {
    const value = Number(raw);
    return raw !== undefined && raw.trim() !== '' && Number.isFinite(value) ? value : fallback;
}

function parseOrigins(raw: string | undefined): string[] | null {
    if (!raw || raw.trim() === '*') return null;
    return raw.split(',').map(o => o.trim()).filter(Boolean);
}

export function getConfig(env: NodeJS.ProcessEnv = process.env) {
    const port = parseNumber(env.PORT, 3000);
    const openaiApiKey = env.OPENAI_API_KEY;
    const llmProvider = (env.LLM_PROVIDER || 'openai').toLowerCase();
    const storeDriver: StoreDriver = env.STORE_DRIVER === 'memory' ? 'memory' : 'supabase';

    return {
        port,
        env: env.NODE_ENV || 'development',
        openaiApiKey,
        llmProvider,
        storeDriver,
        supabaseUrl: env.SUPABASE_URL,
        supabaseKey: env.SUPABASE_KEY,
        apifyApiToken: env.APIFY_API_TOKEN,
        // null = allow any origin
        frontendOrigins: parseOrigins(env.FRONTEND_ORIGINS),
        scan: {
            defaultRadiusKm: parseNumber(env.SCAN_DEFAULT_RADIUS_KM, 5),
            backgroundThreshold: parseNumber(env.SCAN_BACKGROUND_THRESHOLD, 50),
        },
    };
}

export type AppConfig = ReturnType<typeof getConfig>;
