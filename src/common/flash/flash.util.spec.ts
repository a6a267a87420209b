import { FakeResponse } from '../../testing/fake-response';
import { consumeFlashes, FLASH_COOKIE, pushFlash } from './flash.util';

describe('flash notices', () => {
  it('queues every notice pushed during one response', () => {
    const res = new FakeResponse();

    pushFlash(res, 'success', 'Registro agregado');
    pushFlash(res, 'warning', 'El campo ya existe');

    expect(res.flashes()).toEqual([
      { category: 'success', message: 'Registro agregado' },
      { category: 'warning', message: 'El campo ya existe' },
    ]);
    expect(res.locals.flashes).toEqual(res.flashes());
  });

  it('reads the notices carried by the request and clears the cookie', () => {
    const res = new FakeResponse();
    const cookie = JSON.stringify([{ category: 'info', message: 'Sesión cerrada' }]);

    const flashes = consumeFlashes({ cookies: { [FLASH_COOKIE]: cookie } }, res);

    expect(flashes).toEqual([{ category: 'info', message: 'Sesión cerrada' }]);
    expect(res.cleared).toEqual([FLASH_COOKIE]);
  });

  it('drops entries that are not notices', () => {
    const res = new FakeResponse();
    const cookie = JSON.stringify([
      { category: 'bogus', message: 'x' },
      { category: 'danger' },
      'plain string',
      { category: 'danger', message: 'Base de datos no disponible' },
    ]);

    expect(consumeFlashes({ cookies: { [FLASH_COOKIE]: cookie } }, res)).toEqual([
      { category: 'danger', message: 'Base de datos no disponible' },
    ]);
  });

  it('ignores a malformed cookie but still clears it', () => {
    const res = new FakeResponse();

    expect(consumeFlashes({ cookies: { [FLASH_COOKIE]: '{not json' } }, res)).toEqual([]);
    expect(res.cleared).toEqual([FLASH_COOKIE]);
  });

  it('leaves the response untouched when there is nothing to show', () => {
    const res = new FakeResponse();

    expect(consumeFlashes({ cookies: {} }, res)).toEqual([]);
    expect(consumeFlashes({}, res)).toEqual([]);
    expect(res.cleared).toEqual([]);
  });
});
