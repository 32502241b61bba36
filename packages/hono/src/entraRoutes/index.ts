// route exports
export { protectedRouteHandler } from './routes/protected.route';
export { publicRouteHandler } from './routes/public.route';
