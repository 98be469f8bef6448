import { BASE_DEFAULTS, buildWorkflowInputs } from './build-config';

describe('buildWorkflowInputs', () => {
  it('sends only the required inputs for the defaults', () => {
    expect(buildWorkflowInputs(BASE_DEFAULTS)).toEqual({
      COMPILER: 'Geopelia-Clang-20',
      KREPO: 'https://github.com/TelegramAt25/niigo_kernel_xiaomi_blossom',
      KBRANCH: 'yoka',
      CONTAINER: 'fedora:40',
    });
  });

  it('adds non-empty optional inputs with their exact values', () => {
    const inputs = buildWorkflowInputs({
      ...BASE_DEFAULTS,
      notes: 'my notes',
      suffix: '-test',
      zipRepoUrl: 'https://example.com/anykernel.git',
      zipBranch: 'master',
      kernelSuMode: 'both',
    });

    expect(inputs).toEqual({
      COMPILER: 'Geopelia-Clang-20',
      KREPO: 'https://github.com/TelegramAt25/niigo_kernel_xiaomi_blossom',
      KBRANCH: 'yoka',
      CONTAINER: 'fedora:40',
      NOTES: 'my notes',
      SUFFIX: '-test',
      ZREPO: 'https://example.com/anykernel.git',
      ZBRANCH: 'master',
      KSU: 'both',
    });
  });

  it('includes the recipient only when one is configured', () => {
    expect(
      buildWorkflowInputs({ ...BASE_DEFAULTS, notifyRecipient: '-100123' }),
    ).toEqual({
      COMPILER: 'Geopelia-Clang-20',
      KREPO: 'https://github.com/TelegramAt25/niigo_kernel_xiaomi_blossom',
      KBRANCH: 'yoka',
      CONTAINER: 'fedora:40',
      TG_RECIPIENT: '-100123',
    });
    expect(buildWorkflowInputs(BASE_DEFAULTS)).not.toHaveProperty(
      'TG_RECIPIENT',
    );
  });
});
