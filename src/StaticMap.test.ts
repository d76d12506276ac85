import { describe, expect, it } from 'vitest';
import { StaticMapOptionsBuilder } from './builders/config/StaticMapOptionsBuilder';
import { MapImageRequestBuilder } from './builders/map/MapImageRequestBuilder';
import { StaticMap } from './StaticMap';
import { createImage, imageAdapter } from './test/helpers';

describe('StaticMap', () => {
  it('creates request builders with the shared options', () => {
    const staticMap = new StaticMap(new StaticMapOptionsBuilder().setBaseURL('http://localhost/staticmap').build());

    const request = staticMap.request('Prague');

    expect(request).toBeInstanceOf(MapImageRequestBuilder);
    expect(request.getUrl()).toBe(
      'http://localhost/staticmap?center=Prague&zoom=10&size=500x400&format=png&maptype=roadmap&sensor=false',
    );
  });

  it('creates independent builders', () => {
    const staticMap = new StaticMap();

    staticMap.request('Prague').setMarker('A');

    expect(staticMap.request('Prague').buildQueryString()).toBe(
      'center=Prague&zoom=10&size=500x400&format=png&maptype=roadmap&sensor=false',
    );
  });

  it('leaves the location unset when none is given', () => {
    expect(new StaticMap().request().buildQueryString()).toBe('zoom=10&size=500x400&format=png&maptype=roadmap&sensor=false');
  });

  it('fetches through the shared adapter', async () => {
    const png = await createImage('png');
    const { adapter, requests } = imageAdapter(png, 'image/png');
    const staticMap = new StaticMap({ adapter });

    const image = await staticMap.request('Brno').setZoom(12).getImageBytes();

    expect(image.width).toBe(4);
    expect(requests[0].url).toBe(
      'https://maps.googleapis.com/maps/api/staticmap?center=Brno&zoom=12&size=500x400&format=png&maptype=roadmap&sensor=false',
    );
  });
});
