import { describe, it, expect } from 'vitest';
import { classify, inferClassification } from '../../../../src/core/model/classifier.js';
import { isAllowedTarget, isOwnFeature } from '../../../../src/core/rules/direction-table.js';
import { DirectionViolationRule } from '../../../../src/core/rules/direction-violation.js';
import { IntentCapabilityRule, breaksContainment } from '../../../../src/core/rules/intent-capability-violation.js';
import { buildGraph, violationsOf } from '../../../helpers/graph.js';

const IDA_ALPHA = 'project/features/alpha/ida_alpha.c';
const PRX_ALPHA = 'project/features/alpha/prx_alpha.h';
const POI_ALPHA = 'project/features/alpha/poi_alpha.h';
const CFG_ALPHA = 'project/features/alpha/cfg_alpha.h';
const PRX_BETA = 'project/features/beta/prx_beta.h';
const SVC_LOG = 'infra/service/svc_log.h';
const HAL_UART = 'infra/platform/hal/hal_uart.h';
const BSP_BOARD = 'infra/platform/bsp/bsp_board.h';
const CFG_CORE = 'infra/bootstrap/cfg_core.h';
const STM_BUS = 'project/datastreams/stm_bus.h';
const MDW_QUEUE = 'deps/middleware/mdw_queue.h';
const CFG_VENDOR = 'deps/middleware/cfg_vendor.h';

describe('direction table', () => {
  it.each([
    [IDA_ALPHA, PRX_ALPHA, true],
    [IDA_ALPHA, POI_ALPHA, true],
    [IDA_ALPHA, CFG_CORE, true],
    [IDA_ALPHA, PRX_BETA, false],
    [PRX_ALPHA, SVC_LOG, true],
    [PRX_ALPHA, STM_BUS, true],
    [PRX_ALPHA, POI_ALPHA, true],
    [POI_ALPHA, PRX_ALPHA, false],
    [POI_ALPHA, HAL_UART, true],
    [SVC_LOG, PRX_ALPHA, false],
    [SVC_LOG, HAL_UART, true],
    [SVC_LOG, MDW_QUEUE, true],
    [SVC_LOG, CFG_VENDOR, true],
    [SVC_LOG, CFG_ALPHA, false],
    [SVC_LOG, STM_BUS, false],
    [HAL_UART, SVC_LOG, false],
    [HAL_UART, BSP_BOARD, true],
    [BSP_BOARD, HAL_UART, false],
    [HAL_UART, CFG_CORE, true],
  ])('%s -> %s allowed: %s', (from, to, allowed) => {
    expect(isAllowedTarget(classify(from), classify(to))).toBe(allowed);
  });

  it('never judges unclassified files', () => {
    expect(isAllowedTarget(classify('tools/gen.c'), classify(PRX_ALPHA))).toBe(true);
    expect(isAllowedTarget(classify(SVC_LOG), classify('tools/gen.h'))).toBe(true);
  });

  it('applies the bootstrap core allowances', () => {
    const idaCore = classify('infra/bootstrap/ida_core.c');
    const prxCore = classify('infra/bootstrap/prx_core.c');
    const poiCore = classify('infra/bootstrap/poi_core.c');

    expect(isAllowedTarget(idaCore, classify(IDA_ALPHA))).toBe(true);
    expect(isAllowedTarget(idaCore, classify(PRX_ALPHA))).toBe(false);
    expect(isAllowedTarget(prxCore, classify(SVC_LOG))).toBe(true);
    expect(isAllowedTarget(prxCore, classify(HAL_UART))).toBe(false);
    expect(isAllowedTarget(poiCore, classify('infra/bootstrap/ida_core.h'))).toBe(true);
    expect(isAllowedTarget(poiCore, classify('infra/bootstrap/prx_core.h'))).toBe(false);
    expect(isAllowedTarget(poiCore, classify(CFG_CORE))).toBe(true);
  });

  it('lets prx_core and poi_core reach database resources but not feature config', () => {
    const prxCore = classify('infra/bootstrap/prx_core.c');
    const poiCore = classify('infra/bootstrap/poi_core.c');
    const dbAlpha = classify('project/features/alpha/db_alpha.h');
    const cfgAlpha = classify('project/features/alpha/cfg_alpha.h');

    expect(dbAlpha.role).toBe('Resource');
    expect(isAllowedTarget(prxCore, dbAlpha)).toBe(true);
    expect(isAllowedTarget(poiCore, dbAlpha)).toBe(true);
    expect(isAllowedTarget(prxCore, cfgAlpha)).toBe(false);
    expect(isAllowedTarget(poiCore, cfgAlpha)).toBe(false);
    expect(isAllowedTarget(classify('infra/bootstrap/ida_core.c'), dbAlpha)).toBe(false);
  });

  it('forbids feature files from reaching bootstrap core files', () => {
    expect(isAllowedTarget(classify(PRX_ALPHA), classify('infra/bootstrap/prx_core.h'))).toBe(false);
  });

  it('judges inferred targets as own by the naming convention', () => {
    const source = classify(PRX_ALPHA);
    expect(isOwnFeature(source, inferClassification('prx_alpha_util.h'))).toBe(true);
    expect(isOwnFeature(source, inferClassification('prx_alphabet.h'))).toBe(false);
    expect(isOwnFeature(source, inferClassification('prx_beta.h'))).toBe(false);
  });
});

describe('breaksContainment', () => {
  it('treats the contract vocabulary as the only allowed Resource', () => {
    expect(breaksContainment(classify(CFG_CORE))).toBe(false);
    expect(breaksContainment(classify(CFG_ALPHA))).toBe(true);
    expect(breaksContainment(classify(SVC_LOG))).toBe(true);
    expect(breaksContainment(classify(HAL_UART))).toBe(true);
    expect(breaksContainment(classify(STM_BUS))).toBe(false);
  });
});

describe('IntentCapabilityRule', () => {
  const rule = new IntentCapabilityRule();

  it('reports one finding per forbidden edge', () => {
    const graph = buildGraph([
      { path: IDA_ALPHA, includes: ['cfg_core.h', 'svc_log.h', 'prx_alpha.h', 'cfg_alpha.h'] },
      { path: CFG_CORE },
      { path: SVC_LOG },
      { path: PRX_ALPHA },
      { path: CFG_ALPHA },
    ]);

    expect(violationsOf(rule, graph, IDA_ALPHA)).toEqual([
      {
        line: 2,
        message: "Intent must stay self-contained but references Capability (service) 'svc_log' via 'svc_log.h'",
      },
      {
        line: 4,
        message:
          "Intent must stay self-contained but references Resource (resource, feature 'alpha') 'cfg_alpha' via 'cfg_alpha.h'",
      },
    ]);
  });

  it('judges unresolved references by their inferred role', () => {
    const graph = buildGraph([{ path: IDA_ALPHA, includes: ['hal_gpio.h'] }]);

    expect(violationsOf(rule, graph, IDA_ALPHA)).toEqual([
      { line: 1, message: "Intent must stay self-contained but references Platform (hal) 'hal_gpio' via 'hal_gpio.h'" },
    ]);
  });

  it('ignores system references', () => {
    const graph = buildGraph([
      { path: IDA_ALPHA, refs: [{ specifier: 'svc_log.h', line: 1, kind: 'system' }] },
      { path: SVC_LOG },
    ]);

    expect(violationsOf(rule, graph, IDA_ALPHA)).toEqual([]);
  });

  it('does not apply to other roles', () => {
    const graph = buildGraph([{ path: PRX_ALPHA, includes: ['svc_log.h'] }, { path: SVC_LOG }]);

    expect(violationsOf(rule, graph, PRX_ALPHA)).toEqual([]);
  });
});

describe('DirectionViolationRule', () => {
  const rule = new DirectionViolationRule();

  it('reports an upward reference', () => {
    const graph = buildGraph([{ path: POI_ALPHA, includes: ['prx_alpha.h'] }, { path: PRX_ALPHA }]);

    expect(violationsOf(rule, graph, POI_ALPHA)).toEqual([
      {
        line: 1,
        message:
          "Production 'poi_alpha' may not depend on Interpretation (feature, feature 'alpha') 'prx_alpha' ('prx_alpha.h')",
      },
    ]);
  });

  it('does not repeat containment breaches already reported for Intent', () => {
    const graph = buildGraph([{ path: IDA_ALPHA, includes: ['svc_log.h'] }, { path: SVC_LOG }]);

    expect(violationsOf(rule, graph, IDA_ALPHA)).toEqual([]);
  });

  it('reports Intent reaching another feature', () => {
    const graph = buildGraph([{ path: IDA_ALPHA, includes: ['prx_beta.h'] }, { path: PRX_BETA }]);

    expect(violationsOf(rule, graph, IDA_ALPHA)).toEqual([
      {
        line: 1,
        message: "Intent 'ida_alpha' may not depend on Interpretation (feature, feature 'beta') 'prx_beta' ('prx_beta.h')",
      },
    ]);
  });

  it('reports bsp reaching hal', () => {
    const graph = buildGraph([{ path: BSP_BOARD, includes: ['hal_uart.h'] }, { path: HAL_UART }]);

    expect(violationsOf(rule, graph, BSP_BOARD)).toEqual([
      { line: 1, message: "Platform 'bsp_board' may not depend on Platform (hal) 'hal_uart' ('hal_uart.h')" },
    ]);
  });

  it('uses the naming convention for unresolved feature references', () => {
    const graph = buildGraph([{ path: PRX_ALPHA, includes: ['prx_alpha_util.h', 'prx_gamma.h'] }]);

    expect(violationsOf(rule, graph, PRX_ALPHA)).toEqual([
      { line: 2, message: "Interpretation 'prx_alpha' may not depend on Interpretation (feature) 'prx_gamma' ('prx_gamma.h')" },
    ]);
  });

  it('allows a source file to include its own header', () => {
    const graph = buildGraph([
      { path: 'project/features/alpha/prx_alpha.c', includes: ['prx_alpha.h'] },
      { path: PRX_ALPHA },
    ]);

    expect(violationsOf(rule, graph, 'project/features/alpha/prx_alpha.c')).toEqual([]);
  });
});
