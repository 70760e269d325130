/**
 * Route table generator
 *
 * One module listing every endpoint of every entity, in dependency order,
 * with a helper registering them on an Express router.
 *
 * @module generators/routes
 */

import { e, param, prop, s, t } from './code-model.js';
import type { Expr, ModuleUnit, OutputUnit } from './code-model.js';
import { handlersTypeName } from './handlers.js';
import { endpointsFor, entityVar, importPath, paths } from './shared.js';
import { GENERATED_HEADER } from './types.js';
import type { ArtifactGenerator, GeneratorContext } from './types.js';

function routesModule(context: GeneratorContext): ModuleUnit {
  const path = paths.routes;
  const { entities } = context.model;
  const basePath = `/${context.appName}`;

  const definitions: Expr[] = entities.flatMap((entity) =>
    endpointsFor(entity, context.model).map((endpoint) => e.props([
      ['method', e.lit(endpoint.method)],
      ['path', e.lit(endpoint.path)],
      ['entity', e.lit(entity.name)],
      ['operation', e.lit(endpoint.operation)],
      ['handler', e.path(`handlers.${entityVar(entity)}.${endpoint.handler}`)],
    ]))
  );

  return {
    kind: 'module',
    path,
    header: GENERATED_HEADER,
    imports: [
      { from: 'express', names: ['Request', 'Response', 'Router'], typeOnly: true },
      ...entities.map((entity) => ({
        from: importPath(path, paths.handler(entity)),
        names: [handlersTypeName(entity)],
        typeOnly: true,
      })),
    ],
    declarations: [
      { kind: 'const', name: 'BASE_PATH', exported: true, doc: 'Mount point of the generated API', value: e.lit(basePath) },
      {
        kind: 'type-alias',
        name: 'HttpMethod',
        exported: true,
        type: t.union(t.lit('get'), t.lit('post'), t.lit('patch'), t.lit('delete')),
      },
      {
        kind: 'type-alias',
        name: 'RouteHandler',
        exported: true,
        type: t.fn([param('req', t.named('Request')), param('res', t.named('Response'))], t.named('Promise', t.named('void'))),
      },
      {
        kind: 'interface',
        name: 'RouteDefinition',
        exported: true,
        members: [
          prop('method', t.named('HttpMethod')),
          prop('path', t.named('string')),
          prop('entity', t.named('string')),
          prop('operation', t.named('string')),
          prop('handler', t.named('RouteHandler')),
        ],
      },
      {
        kind: 'interface',
        name: 'ApplicationHandlers',
        exported: true,
        members: entities.map((entity) => prop(entityVar(entity), t.named(handlersTypeName(entity)))),
      },
      {
        kind: 'function',
        name: 'buildRoutes',
        exported: true,
        doc: 'Every route, lookups registered before the detail routes they would shadow',
        params: [param('handlers', t.named('ApplicationHandlers'))],
        returns: t.array(t.named('RouteDefinition')),
        body: [s.return(e.array(definitions))],
      },
      {
        kind: 'function',
        name: 'registerRoutes',
        exported: true,
        doc: 'Register every route; handler rejections are passed to `next`',
        params: [param('router', t.named('Router')), param('handlers', t.named('ApplicationHandlers'))],
        returns: t.named('Router'),
        body: [
          s.const('routes', e.call('buildRoutes', e.ref('handlers'))),
          s.expr(e.call(e.path('routes.forEach'), e.arrow([param('route')], [
            s.expr(e.call(
              e.index(e.ref('router'), e.path('route.method')),
              e.path('route.path'),
              e.arrow([param('req'), param('res'), param('next')], [
                s.expr(e.call(e.member(e.call(e.path('route.handler'), e.ref('req'), e.ref('res')), 'catch'), e.ref('next'))),
              ])
            )),
          ]))),
          s.return(e.ref('router')),
        ],
      },
    ],
  };
}

export const routesGenerator: ArtifactGenerator = {
  kind: 'routes',
  generate(context: GeneratorContext): OutputUnit[] {
    return [routesModule(context)];
  },
};
