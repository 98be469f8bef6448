import {
  MissingConfigurationError,
  buildSettings,
  validateEnv,
} from './settings';

const REQUIRED = {
  TELEGRAM_BOT_TOKEN: 'test-telegram-token',
  GITHUB_TOKEN: 'test-secret',
};

const missingVariables = (env: Record<string, string>) => {
  try {
    validateEnv(env);
  } catch (error) {
    if (error instanceof MissingConfigurationError) return error.variables;
    throw error;
  }
  return [];
};

describe('validateEnv', () => {
  it('refuses to start without credentials', () => {
    expect(() => validateEnv({})).toThrow(MissingConfigurationError);
    expect(missingVariables({})).toEqual(['TELEGRAM_BOT_TOKEN', 'GITHUB_TOKEN']);
  });

  it('treats a blank credential as missing', () => {
    expect(
      missingVariables({ ...REQUIRED, GITHUB_TOKEN: '   ' }),
    ).toEqual(['GITHUB_TOKEN']);
  });

  it('rejects an empty default for a required field', () => {
    expect(
      missingVariables({ ...REQUIRED, DEFAULT_KERNEL_BRANCH: '' }),
    ).toEqual(['DEFAULT_KERNEL_BRANCH']);
  });

  it('names the missing variables in the message', () => {
    expect(() => validateEnv({ GITHUB_TOKEN: 'test-secret' })).toThrow(
      'Missing or invalid configuration: TELEGRAM_BOT_TOKEN',
    );
  });
});

describe('buildSettings', () => {
  it('falls back to the built-in defaults', () => {
    const settings = buildSettings(validateEnv(REQUIRED));

    expect(settings.telegramToken).toBe('test-telegram-token');
    expect(settings.github).toEqual({
      apiBaseUrl: 'https://api.github.com',
      owner: 'zyexro',
      repo: 'kernel_builder',
      workflowFile: 'main.yml',
      dispatchRef: 'enanan',
      token: 'test-secret',
      timeoutMs: 15000,
    });
    expect(settings.defaults).toEqual({
      compiler: 'Geopelia-Clang-20',
      kernelRepoUrl: 'https://github.com/TelegramAt25/niigo_kernel_xiaomi_blossom',
      kernelBranch: 'yoka',
      containerImage: 'fedora:40',
      notes: '',
      suffix: '',
      zipRepoUrl: '',
      zipBranch: '',
      kernelSuMode: '',
      notifyRecipient: '',
    });
  });

  it('applies overrides from the environment', () => {
    const settings = buildSettings(
      validateEnv({
        ...REQUIRED,
        GITHUB_API_URL: 'https://github.example.com/api/v3/',
        GITHUB_TIMEOUT_MS: '5000',
        TELEGRAM_CHAT_ID: '-100123',
        DEFAULT_COMPILER: 'LLVM-18',
        DEFAULT_SUFFIX: '-nightly',
        DEFAULT_NOTES: '',
      }),
    );

    expect(settings.github.apiBaseUrl).toBe('https://github.example.com/api/v3');
    expect(settings.github.timeoutMs).toBe(5000);
    expect(settings.defaults.compiler).toBe('LLVM-18');
    expect(settings.defaults.suffix).toBe('-nightly');
    expect(settings.defaults.notes).toBe('');
    expect(settings.defaults.notifyRecipient).toBe('-100123');
  });
});
