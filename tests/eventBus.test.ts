import { DownloadRequestedData } from '../src/types';
import { AppEvents, EventBus } from '../src/utils/EventBus';

describe('EventBus', () => {
  it('should deliver published data to subscribers until they unsubscribe', () => {
    const bus = new EventBus();
    const received: DownloadRequestedData[] = [];
    const unsubscribe = bus.subscribe(AppEvents.DOWNLOAD_REQUESTED, (data) => {
      received.push(data);
    });

    expect(bus.publish(AppEvents.DOWNLOAD_REQUESTED, { resource: 'category-index', reason: 'first' })).toBe(true);
    unsubscribe();
    expect(bus.publish(AppEvents.DOWNLOAD_REQUESTED, { resource: 'category-index', reason: 'second' })).toBe(false);

    expect(received).toEqual([{ resource: 'category-index', reason: 'first' }]);
  });
});
