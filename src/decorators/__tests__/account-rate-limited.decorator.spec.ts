import { INTERCEPTORS_METADATA } from '@nestjs/common/constants';
import {
  ACCOUNT_RATE_LIMITED_KEY,
  AccountRateLimited,
} from '../account-rate-limited.decorator';
import { AccountAdmissionInterceptor } from '../../interceptors/account-admission.interceptor';

describe('AccountRateLimited', () => {
  it('should set the default header metadata on a method', () => {
    class TestController {
      @AccountRateLimited()
      handle() {
        return true;
      }
    }

    const metadata = Reflect.getMetadata(
      ACCOUNT_RATE_LIMITED_KEY,
      TestController.prototype.handle,
    );

    expect(metadata).toEqual({ header: 'x-account-id', param: undefined });
  });

  it('should lowercase a custom header and keep the param', () => {
    @AccountRateLimited({ header: 'X-Tenant', param: 'tenantId' })
    class TestController {}

    const metadata = Reflect.getMetadata(
      ACCOUNT_RATE_LIMITED_KEY,
      TestController,
    );

    expect(metadata).toEqual({ header: 'x-tenant', param: 'tenantId' });
  });

  it('should attach the admission interceptor', () => {
    @AccountRateLimited()
    class TestController {}

    const interceptors = Reflect.getMetadata(
      INTERCEPTORS_METADATA,
      TestController,
    );

    expect(interceptors).toEqual([AccountAdmissionInterceptor]);
  });
});
