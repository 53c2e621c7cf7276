import { canonicalPath, PathResolver } from '../PathResolver';
import { IDENTIFIER_MAPPINGS } from '../ObjectTypeRegistry';
import { ObjectStatus } from '../../../types';
import { PathLookup } from '../../workspace.service';
import { ApiError, CancelledError, ResolutionError } from '../../../utils/errors';

function lookupReturning(result: ObjectStatus | Error) {
  const paths: string[] = [];
  const lookup: PathLookup = {
    getStatus: async (path) => {
      paths.push(path);
      if (result instanceof Error) {
        throw result;
      }
      return result;
    },
  };
  return { lookup, paths };
}

describe('PathResolver', () => {
  describe('canonicalPath', () => {
    it('should join the prefix and id', () => {
      expect(canonicalPath('cluster-policy', 'ABC')).toBe('/cluster-policies/ABC');
      expect(canonicalPath('sql-alert', 'a1')).toBe('/sql/alerts/a1');
    });

    it('should ignore the id for authorization objects', () => {
      expect(canonicalPath('tokens', 'tokens')).toBe('/authorization/tokens');
      expect(canonicalPath('passwords', 'anything')).toBe('/authorization/passwords');
    });
  });

  describe('resolve', () => {
    it('should not look up id identifiers', async () => {
      const { lookup, paths } = lookupReturning(new Error('unused'));
      const resolver = new PathResolver(lookup);

      await expect(resolver.resolve(IDENTIFIER_MAPPINGS.registered_model_id, 'm-1')).resolves.toEqual({
        objectType: 'registered-model',
        objectPath: '/registered-models/m-1',
      });
      expect(paths).toEqual([]);
    });

    it('should use the reported type of a path', async () => {
      const { lookup, paths } = lookupReturning({ object_id: 42, object_type: 'DIRECTORY' });
      const resolver = new PathResolver(lookup);

      await expect(resolver.resolve(IDENTIFIER_MAPPINGS.notebook_path, '/Shared/reports')).resolves.toEqual({
        objectType: 'directory',
        objectPath: '/directories/42',
      });
      expect(paths).toEqual(['/Shared/reports']);
    });

    it('should reject objects without access control', async () => {
      const { lookup } = lookupReturning({ object_id: 7, object_type: 'LIBRARY' });
      const resolver = new PathResolver(lookup);

      await expect(resolver.resolve(IDENTIFIER_MAPPINGS.directory_path, '/Shared/lib.jar')).rejects.toThrow(
        'Cannot set permissions on /Shared/lib.jar: LIBRARY objects have no access control',
      );
    });

    it('should wrap lookup failures and keep the cause', async () => {
      const failure = new ApiError(400, 'INVALID_REQUEST', 'Internal error happened');
      const { lookup } = lookupReturning(failure);
      const resolver = new PathResolver(lookup);

      const error = await resolver.resolve(IDENTIFIER_MAPPINGS.repo_path, '/Repos/x').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ResolutionError);
      expect(error).toMatchObject({
        message: 'Cannot load path /Repos/x: Internal error happened',
        target: '/Repos/x',
        cause: failure,
      });
    });

    it('should pass cancellation through', async () => {
      const { lookup } = lookupReturning(new CancelledError('request completed'));
      const resolver = new PathResolver(lookup);

      await expect(resolver.resolve(IDENTIFIER_MAPPINGS.repo_path, '/Repos/x')).rejects.toBeInstanceOf(CancelledError);
    });

    it('should not look up once aborted', async () => {
      const { lookup, paths } = lookupReturning({ object_id: 1, object_type: 'NOTEBOOK' });
      const controller = new AbortController();
      controller.abort();

      await expect(new PathResolver(lookup).resolve(IDENTIFIER_MAPPINGS.notebook_path, '/n', controller.signal))
        .rejects.toThrow('operation cancelled before resolving /n');
      expect(paths).toEqual([]);
    });
  });
});
