import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  classify,
  inferClassification,
  legacyLayoutOf,
  moduleName,
  nameMatchesFeature,
  normalizeRelPath,
} from '../../../../src/core/model/classifier.js';

describe('moduleName', () => {
  it.each([
    ['prx_alpha.h', 'prx_alpha'],
    ['PRX_Alpha.C', 'prx_alpha'],
    ['ida_alpha.d.ts', 'ida_alpha'],
    ['svc_log.test.ts', 'svc_log.test'],
    ['Makefile', 'makefile'],
  ])('%s -> %s', (file, name) => {
    expect(moduleName(file)).toBe(name);
  });
});

describe('normalizeRelPath', () => {
  it('uses POSIX separators without a leading ./', () => {
    expect(normalizeRelPath('.\\project\\features\\alpha\\ida_alpha.c')).toBe('project/features/alpha/ida_alpha.c');
    expect(normalizeRelPath('././infra/service/svc_log.c')).toBe('infra/service/svc_log.c');
  });
});

describe('classify', () => {
  it('classifies feature roles with their feature', () => {
    expect(classify('project/features/alpha/ida_alpha.c')).toEqual({
      role: 'Intent',
      feature: 'alpha',
      featureKnown: true,
      category: 'feature',
      contract: false,
      projectOwned: true,
      name: 'ida_alpha',
    });
    expect(classify('project/features/alpha/sub/prx_alpha_filter.c').role).toBe('Interpretation');
    expect(classify('project/features/alpha/sub/prx_alpha_filter.c').feature).toBe('alpha');
    expect(classify('project/features/Alpha/poi_alpha.c').feature).toBe('alpha');
  });

  it.each([
    ['project/config/cfg_project.h', 'Resource', 'resource'],
    ['project/config/db_project.c', 'Resource', 'resource'],
    ['project/datastreams/stm_bus.c', 'DataPlane', 'datastream'],
    ['infra/service/svc_log.c', 'Capability', 'service'],
    ['deps/middleware/mdw_queue.c', 'Capability', 'middleware'],
    ['deps/extern/stm_wire.c', 'DataPlane', 'datastream'],
    ['infra/platform/hal/hal_uart.c', 'Platform', 'hal'],
    ['infra/platform/bsp/bsp_board.c', 'Platform', 'bsp'],
    ['infra/bootstrap/ida_core.c', 'Intent', 'bootstrap'],
    ['infra/bootstrap/poi_core.h', 'Production', 'bootstrap'],
    ['infra/bootstrap/cfg_core.h', 'Resource', 'contract'],
    ['deps/extern/zlib/zlib.c', 'Unclassified', 'unmanaged'],
    ['tools/gen.c', 'Unclassified', 'unmanaged'],
    ['main.c', 'Unclassified', 'unmanaged'],
  ])('%s is %s (%s)', (path, role, category) => {
    const c = classify(path);
    expect(c.role).toBe(role);
    expect(c.category).toBe(category);
    expect(c.issue).toBeUndefined();
  });

  it('marks the contract vocabulary', () => {
    expect(classify('infra/bootstrap/cfg_core.h').contract).toBe(true);
    expect(classify('project/config/cfg_project.h').contract).toBe(false);
  });

  it('marks project ownership', () => {
    expect(classify('project/datastreams/stm_bus.c').projectOwned).toBe(true);
    expect(classify('deps/middleware/cfg_vendor.h').projectOwned).toBe(false);
  });

  it('classifies nested architecture units under deps/', () => {
    const c = classify('deps/middleware/vendorlib/project/features/gamma/ida_gamma.c');
    expect(c.role).toBe('Intent');
    expect(c.feature).toBe('gamma');
    expect(c.projectOwned).toBe(true);
    expect(classify('deps/extern/rtos/infra/service/svc_timer.c').role).toBe('Capability');
  });

  it.each([
    ['project/features/alpha/util.c', 'naming-invalid'],
    ['infra/bootstrap/helpers.c', 'naming-invalid'],
    ['infra/service/prx_alpha.c', 'naming-invalid'],
    ['project/features/ida_top.c', 'naming-invalid'],
    ['project/features/alpha/cfg_project.h', 'naming-invalid'],
    ['project/features/alpha/ida_core.c', 'naming-invalid'],
    ['src/cfg_core.h', 'naming-invalid'],
    ['infra/platform/hal/bsp_board.c', 'naming-invalid'],
    ['infra/bootstrap/inf_boot.c', 'reserved-prefix-misuse'],
    ['tools/inf_gen.c', 'reserved-prefix-misuse'],
  ])('%s has issue %s', (path, kind) => {
    const c = classify(path);
    expect(c.role).toBe('Unclassified');
    expect(c.category).toBe('invalid');
    expect(c.issue?.kind).toBe(kind);
  });

  it('explains misplaced core and feature files', () => {
    expect(classify('src/cfg_core.h').issue?.message).toBe("'cfg_core.h' must be located under infra/bootstrap/");
    expect(classify('project/features/ida_top.c').issue?.message).toBe(
      "'ida_top.c' must be inside a feature folder project/features/<feature>/"
    );
    expect(classify('deps/middleware/svc_x.c').issue?.message).toBe(
      "'svc_x.c' (Capability) must be placed under infra/service/"
    );
    expect(classify('infra/service/cfg_x.h').issue?.message).toBe(
      "'cfg_x.h' (Resource) must be placed under project/features/ or project/config/ or deps/middleware/ or deps/extern/"
    );
  });

  it('is idempotent and independent of call order', () => {
    const segment = fc.constantFrom(
      'project/features/alpha/',
      'project/features/',
      'project/config/',
      'project/datastreams/',
      'infra/bootstrap/',
      'infra/service/',
      'infra/platform/hal/',
      'deps/middleware/unit/project/features/beta/',
      'tools/',
      ''
    );
    const name = fc.constantFrom('ida_alpha', 'prx_x', 'poi_y', 'cfg_core', 'cfg_project', 'svc_z', 'inf_q', 'plain');
    const ext = fc.constantFrom('.c', '.h', '.cs', '.vb', '.ts');
    const path = fc.tuple(segment, name, ext).map(([s, n, e]) => `${s}${n}${e}`);

    fc.assert(
      fc.property(fc.array(path, { minLength: 1, maxLength: 12 }), (paths) => {
        const forward = paths.map((p) => classify(p));
        const backward = [...paths].reverse().map((p) => classify(p)).reverse();
        expect(backward).toEqual(forward);
        expect(paths.map((p) => classify(normalizeRelPath(`./${p}`)))).toEqual(forward);
      })
    );
  });
});

describe('inferClassification', () => {
  it('infers the role from the reference name with an unknown feature', () => {
    expect(inferClassification('drivers/hal_gpio.h')).toEqual({
      role: 'Platform',
      feature: '',
      featureKnown: false,
      category: 'hal',
      contract: false,
      projectOwned: false,
      name: 'hal_gpio',
    });
    expect(inferClassification('cfg_core.h').contract).toBe(true);
    expect(inferClassification('ida_core.h').category).toBe('bootstrap');
    expect(inferClassification('stdint.h').role).toBe('Unclassified');
  });
});

describe('nameMatchesFeature', () => {
  it('follows the <prefix><feature>[_...] convention', () => {
    expect(nameMatchesFeature('prx_alpha', 'alpha')).toBe(true);
    expect(nameMatchesFeature('prx_alpha_filter', 'alpha')).toBe(true);
    expect(nameMatchesFeature('prx_alphabet', 'alpha')).toBe(false);
    expect(nameMatchesFeature('prx_alpha', '')).toBe(false);
    expect(nameMatchesFeature('alpha', 'alpha')).toBe(false);
  });
});

describe('legacyLayoutOf', () => {
  it('matches deprecated roots only at the code root', () => {
    expect(legacyLayoutOf('platform/board.c')?.replacement).toBe('infra/platform/');
    expect(legacyLayoutOf('infra/platform/hal/hal_uart.c')).toBeUndefined();
    expect(legacyLayoutOf('project/features/alpha/ida_alpha.c')).toBeUndefined();
  });
});
