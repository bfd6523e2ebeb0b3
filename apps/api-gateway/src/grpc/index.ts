export { GrpcClientModule } from './grpc-client.module';
export { TaskDispatchClient } from './task-dispatch.client';
export { TaskDispatchException } from './task-dispatch.exception';
